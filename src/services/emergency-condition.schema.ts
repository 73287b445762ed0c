import { z } from 'zod';

/**
 * Schemas for the bundled emergency dataset.
 *
 * Every record field is optional. Missing or null values take the defaults
 * below; a value of the wrong type fails the parse.
 */

const text = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform(value => value ?? fallback);

const stringList = z
  .array(z.string())
  .nullish()
  .transform(value => value ?? []);

const questionList = z
  .array(z.record(z.unknown()))
  .nullish()
  .transform(value => value ?? []);

export const emergencyConditionSchema = z
  .object({
    id: text('unknown_id'),
    title: text('Unknown Title'),
    description: text(''),
    severity: text('medium'),
    symptoms: stringList,
    dos: stringList,
    donts: stringList,
    assessment_questions: questionList,
    urgent_actions: stringList,
  })
  .transform(
    (raw): EmergencyCondition => ({
      id: raw.id,
      title: raw.title,
      description: raw.description,
      severity: raw.severity,
      symptoms: raw.symptoms,
      dos: raw.dos,
      donts: raw.donts,
      assessmentQuestions: raw.assessment_questions,
      urgentActions: raw.urgent_actions,
    })
  );

export const emergencyDocumentSchema = z.object({
  emergencies: z
    .array(z.unknown())
    .nullish()
    .transform(value => value ?? []),
});

export interface EmergencyCondition {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  /** Conventionally 'high' | 'medium' | 'low'; other values are kept as given */
  readonly severity: string;
  readonly symptoms: readonly string[];
  readonly dos: readonly string[];
  readonly donts: readonly string[];
  /** Raw question records; see parseAssessmentQuestion() for the typed view */
  readonly assessmentQuestions: readonly Record<string, unknown>[];
  readonly urgentActions: readonly string[];
}

export function parseEmergencyCondition(json: unknown): EmergencyCondition {
  return emergencyConditionSchema.parse(json);
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
