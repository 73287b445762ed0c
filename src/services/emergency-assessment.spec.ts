import { describe, expect, it, vi } from 'vitest';
import { createFirstResponseInjector } from '../standalone';
import { AssessmentFlow, parseAssessmentQuestion, type AssessmentQuestion } from './emergency-assessment';
import { LoggerService } from './logger.service';

const QUESTIONS: AssessmentQuestion[] = [
  { id: 'chest_pain', question: 'Chest pain?', type: 'boolean' },
  {
    id: 'pain_level',
    question: 'How bad?',
    type: 'slider',
    min: 0,
    max: 10,
    divisions: 10,
    condition: { dependsOn: 'chest_pain', equals: true },
  },
  {
    id: 'responsive',
    question: 'Responding?',
    type: 'boolean',
    jumps: [{ whenAnswerIs: false, toQuestion: 'cpr_notice' }],
  },
  { id: 'breathing', question: 'Breathing?', type: 'multiple_choice' },
  { id: 'cpr_notice', question: 'Start CPR', type: 'info' },
];

describe('parseAssessmentQuestion', () => {
  it('applies defaults to an empty record', () => {
    const question = parseAssessmentQuestion({}, 2);

    expect(question.id).toBe('q3');
    expect(question.question).toBe('Missing question text');
    expect(question.type).toBe('info');
    expect(question.options).toBeUndefined();
  });

  it('maps text to question and keeps optional fields', () => {
    const question = parseAssessmentQuestion(
      {
        id: 'gender',
        text: 'Gender',
        description: 'As the person describes it',
        type: 'multiple_choice',
        options: [
          { text: 'Female', value: 'female' },
          { text: 'Male', value: 'male' },
        ],
      },
      0
    );

    expect(question).toEqual({
      id: 'gender',
      question: 'Gender',
      description: 'As the person describes it',
      type: 'multiple_choice',
      options: [
        { text: 'Female', value: 'female' },
        { text: 'Male', value: 'male' },
      ],
    });
  });

  it('derives slider divisions from the range', () => {
    expect(parseAssessmentQuestion({ type: 'slider', min: 0, max: 10 }, 0).divisions).toBe(10);
    expect(parseAssessmentQuestion({ type: 'slider', min: 2.5, max: 7.9 }, 0).divisions).toBe(5);
  });

  it('keeps explicit divisions and ignores empty ranges', () => {
    expect(parseAssessmentQuestion({ type: 'slider', min: 0, max: 10, divisions: 4 }, 0).divisions).toBe(4);
    expect(parseAssessmentQuestion({ type: 'slider', min: 5, max: 5 }, 0).divisions).toBeUndefined();
    expect(parseAssessmentQuestion({ type: 'text', min: 0, max: 10 }, 0).divisions).toBeUndefined();
  });

  it('treats null like a missing field', () => {
    expect(parseAssessmentQuestion({ id: null, text: null, type: null }, 0)).toEqual({
      id: 'q1',
      question: 'Missing question text',
      type: 'info',
    });
  });

  it('rejects fields of the wrong type', () => {
    expect(() => parseAssessmentQuestion({ id: 7 }, 0)).toThrow();
  });
});

describe('AssessmentFlow', () => {
  it('starts at the first question', () => {
    const flow = new AssessmentFlow(QUESTIONS);

    expect(flow.current()?.id).toBe('chest_pain');
    expect(flow.progress()).toBe(0);
    expect(flow.isComplete()).toBe(false);
  });

  it('shows a conditional question when its dependency matches', () => {
    const flow = new AssessmentFlow(QUESTIONS);

    flow.answer(true);

    expect(flow.current()?.id).toBe('pain_level');
  });

  it('skips a conditional question when its dependency differs', () => {
    const flow = new AssessmentFlow(QUESTIONS);

    flow.answer(false);

    expect(flow.current()?.id).toBe('responsive');
    expect(flow.shouldSkip(QUESTIONS[1])).toBe(true);
  });

  it('does not skip while the dependency is unanswered', () => {
    const flow = new AssessmentFlow(QUESTIONS);

    expect(flow.shouldSkip(QUESTIONS[1])).toBe(false);
  });

  it('follows a jump that matches the answer', () => {
    const flow = new AssessmentFlow(QUESTIONS);
    flow.answer(false);

    flow.answer(false);

    expect(flow.current()?.id).toBe('cpr_notice');
    expect(flow.progress()).toBe(0.8);
  });

  it('moves on normally when no jump matches', () => {
    const flow = new AssessmentFlow(QUESTIONS);
    flow.answer(false);

    flow.answer(true);

    expect(flow.current()?.id).toBe('breathing');
  });

  it('goes back along the questions actually shown', () => {
    const flow = new AssessmentFlow(QUESTIONS);
    flow.answer(false);
    flow.answer(false);

    flow.back();
    expect(flow.current()?.id).toBe('responsive');

    flow.back();
    expect(flow.current()?.id).toBe('chest_pain');

    flow.back();
    expect(flow.current()?.id).toBe('chest_pain');
  });

  it('records answers by question id', () => {
    const flow = new AssessmentFlow(QUESTIONS);
    flow.answer(true);
    flow.answer(7);

    expect([...flow.answers().entries()]).toEqual([
      ['chest_pain', true],
      ['pain_level', 7],
    ]);
  });

  it('completes after the last question', () => {
    const flow = new AssessmentFlow(QUESTIONS);
    flow.answer(false);
    flow.answer(false);

    flow.answer(true);

    expect(flow.isComplete()).toBe(true);
    expect(flow.current()).toBeNull();
    expect(flow.progress()).toBe(1);
  });

  it('ignores answers once complete', () => {
    const flow = new AssessmentFlow([{ id: 'only', question: 'Only?', type: 'boolean' }]);
    flow.answer(true);

    flow.answer(false);

    expect(flow.answers().get('only')).toBe(true);
  });

  it('is complete from the start when there are no questions', () => {
    const flow = new AssessmentFlow([]);

    expect(flow.isComplete()).toBe(true);
    expect(flow.progress()).toBe(0);
  });

  it('logs and ignores a jump to an unknown question', () => {
    const logger = createFirstResponseInjector({ environment: { logLevel: 'debug' } }).get(LoggerService);
    logger.configure({ includeTimestamp: false });
    const flow = new AssessmentFlow(
      [
        { id: 'a', question: 'A?', type: 'boolean', jumps: [{ whenAnswerIs: true, toQuestion: 'missing' }] },
        { id: 'b', question: 'B?', type: 'boolean' },
      ],
      logger.createChild('AssessmentFlow')
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    flow.answer(true);
    warn.mockRestore();

    expect(flow.current()?.id).toBe('b');
    expect(logger.getRecentLogs().map(e => `${e.level} ${e.source}: ${e.message}`)).toEqual([
      "warn AssessmentFlow: Jump target question 'missing' not found",
    ]);
  });
});
