import { computed, signal } from '@angular/core';
import { z } from 'zod';
import type { ChildLogger } from './logger.service';

export interface QuestionOption {
  text: string;
  value: unknown;
}

export interface QuestionCondition {
  /** Id of the question whose answer decides visibility */
  dependsOn: string;
  equals?: unknown;
}

export interface QuestionJump {
  whenAnswerIs?: unknown;
  toQuestion: string;
}

export interface AssessmentQuestion {
  id: string;
  question: string;
  description?: string;
  /** 'info', 'boolean', 'slider', 'multiple_choice', 'text', ... */
  type: string;
  options?: QuestionOption[];
  min?: number;
  max?: number;
  divisions?: number;
  defaultValue?: number;
  condition?: QuestionCondition;
  jumps?: QuestionJump[];
  /** Styling hint for 'info' questions (warning, danger, ...) */
  noticeType?: string;
  content?: string;
}

export interface EmergencyAdvice {
  dos: readonly string[];
  donts: readonly string[];
  description: string;
}

export interface EmergencyAssessment {
  id: string;
  title: string;
  questions: AssessmentQuestion[];
  advice: EmergencyAdvice;
  isHighPriority: boolean;
  color: string;
  icon: string;
}

const assessmentQuestionSchema = z.object({
  id: z.string().nullish(),
  text: z.string().nullish(),
  description: z.string().nullish(),
  type: z.string().nullish(),
  options: z.array(z.object({ text: z.string(), value: z.unknown() })).nullish(),
  min: z.number().nullish(),
  max: z.number().nullish(),
  divisions: z.number().int().nullish(),
  defaultValue: z.number().nullish(),
  condition: z.object({ dependsOn: z.string(), equals: z.unknown() }).nullish(),
  jumps: z.array(z.object({ whenAnswerIs: z.unknown(), toQuestion: z.string() })).nullish(),
  noticeType: z.string().nullish(),
  content: z.string().nullish(),
});

/**
 * Typed view of one raw question record. Sliders with a range and no explicit
 * `divisions` get one division per whole unit.
 */
export function parseAssessmentQuestion(raw: Record<string, unknown>, index: number): AssessmentQuestion {
  const q = assessmentQuestionSchema.parse(raw);
  const type = q.type ?? 'info';

  let divisions = q.divisions ?? undefined;
  if (type === 'slider' && divisions === undefined && q.min != null && q.max != null && q.max > q.min) {
    divisions = Math.trunc(q.max - q.min);
  }

  return {
    id: q.id ?? `q${index + 1}`,
    question: q.text ?? 'Missing question text',
    description: q.description ?? undefined,
    type,
    options: q.options ?? undefined,
    min: q.min ?? undefined,
    max: q.max ?? undefined,
    divisions,
    defaultValue: q.defaultValue ?? undefined,
    condition: q.condition ?? undefined,
    jumps: q.jumps ?? undefined,
    noticeType: q.noticeType ?? undefined,
    content: q.content ?? undefined,
  };
}

/**
 * Walks an assessment one question at a time.
 *
 * A question with a `condition` is skipped once its dependency has been
 * answered with a different value. A matching `jumps` entry moves straight to
 * its target question. `back()` retraces the questions actually shown.
 */
export class AssessmentFlow {
  readonly questions: readonly AssessmentQuestion[];

  private readonly index = signal(0);
  private readonly answerMap = signal<ReadonlyMap<string, unknown>>(new Map());
  private readonly history: number[] = [];
  private readonly logger: ChildLogger | undefined;

  readonly answers = this.answerMap.asReadonly();
  readonly current = computed(() => this.questions[this.index()] ?? null);
  readonly isComplete = computed(() => this.index() >= this.questions.length);
  readonly progress = computed(() => {
    const total = this.questions.length;
    if (total === 0) return 0;
    return Math.min(1, Math.max(0, this.index() / total));
  });

  constructor(questions: readonly AssessmentQuestion[], logger?: ChildLogger) {
    this.questions = questions;
    this.logger = logger;
  }

  answer(value: unknown): void {
    const question = this.current();
    if (!question) return;

    const from = this.index();
    this.answerMap.update(prev => new Map(prev).set(question.id, value));
    this.history.push(from);

    for (const jump of question.jumps ?? []) {
      if (jump.whenAnswerIs !== value) continue;
      const target = this.questions.findIndex(q => q.id === jump.toQuestion);
      if (target !== -1) {
        this.index.set(target);
        return;
      }
      this.logger?.warn(`Jump target question '${jump.toQuestion}' not found`, { from: question.id });
    }

    this.index.set(this.nextVisible(from + 1));
  }

  back(): void {
    const previous = this.history.pop();
    if (previous !== undefined) {
      this.index.set(previous);
    }
  }

  shouldSkip(question: AssessmentQuestion): boolean {
    const condition = question.condition;
    if (!condition) return false;
    const answers = this.answerMap();
    if (!answers.has(condition.dependsOn)) return false;
    return answers.get(condition.dependsOn) !== condition.equals;
  }

  private nextVisible(start: number): number {
    let i = start;
    while (i < this.questions.length && this.shouldSkip(this.questions[i])) {
      i++;
    }
    return i;
  }
}
