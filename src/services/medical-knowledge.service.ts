import { Injectable, inject, signal } from '@angular/core';
import { FIRST_RESPONSE_ENVIRONMENT } from '../environments/environment.token';
import { ASSET_SOURCE } from './asset-source';
import {
  AssessmentFlow,
  parseAssessmentQuestion,
  type AssessmentQuestion,
  type EmergencyAssessment,
} from './emergency-assessment';
import {
  emergencyDocumentSchema,
  isJsonObject,
  parseEmergencyCondition,
  type EmergencyCondition,
} from './emergency-condition.schema';
import { FALLBACK_EMERGENCIES } from './emergency-fallback.data';
import { LoggerService } from './logger.service';

export interface SeverityInfo {
  title: string;
  description: string;
  /** CSS hex colour */
  color: string;
  /** Material icon name */
  icon: string;
}

export interface EmergencyActions {
  dos: readonly string[];
  donts: readonly string[];
}

export const SEVERITY_INFO: Readonly<Record<'high' | 'medium' | 'low', Readonly<SeverityInfo>>> = Object.freeze({
  high: Object.freeze({
    title: 'High Severity',
    description: 'Requires immediate medical attention',
    color: '#FF0000',
    icon: 'warning',
  }),
  medium: Object.freeze({
    title: 'Medium Severity',
    description: 'May require prompt medical attention',
    color: '#FF9800',
    icon: 'warning_amber',
  }),
  low: Object.freeze({
    title: 'Low Severity',
    description: 'May be manageable with home care',
    color: '#4CAF50',
    icon: 'info',
  }),
});

export const UNKNOWN_SEVERITY: Readonly<SeverityInfo> = Object.freeze({
  title: 'Unknown Severity',
  description: 'Consult a healthcare professional',
  color: '#9E9E9E',
  icon: 'help',
});

function isKnownSeverity(value: string): value is keyof typeof SEVERITY_INFO {
  return Object.prototype.hasOwnProperty.call(SEVERITY_INFO, value);
}

/**
 * Read-only lookups over the bundled emergency dataset.
 *
 * Call initialize() once before querying; until then every query sees an
 * empty table. If the dataset cannot be loaded a two-entry fallback is
 * installed instead, so the table is never empty afterwards.
 */
@Injectable({ providedIn: 'root' })
export class MedicalKnowledgeService {
  private assets = inject(ASSET_SOURCE);
  private dataPath = inject(FIRST_RESPONSE_ENVIRONMENT).emergencyDataPath;
  private logger = inject(LoggerService).createChild('MedicalKnowledgeService');

  private conditions = new Map<string, EmergencyCondition>();
  private pending: Promise<void> | null = null;

  private readonly initialized = signal(false);
  private readonly size = signal(0);

  isInitialized = this.initialized.asReadonly();
  conditionCount = this.size.asReadonly();

  initialize(): Promise<void> {
    if (this.initialized()) return Promise.resolve();
    if (!this.pending) {
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  getAllEmergencyConditions(): EmergencyCondition[] {
    return [...this.conditions.values()];
  }

  getEmergencyConditionsBySeverity(severity: string): EmergencyCondition[] {
    const wanted = severity.toLowerCase();
    return this.getAllEmergencyConditions().filter(c => c.severity.toLowerCase() === wanted);
  }

  getHighPriorityEmergencies(): EmergencyCondition[] {
    return this.getEmergencyConditionsBySeverity('high');
  }

  getEmergencyCondition(id: string): EmergencyCondition | undefined {
    return this.conditions.get(id);
  }

  getAssessmentQuestions(emergencyId: string): readonly Record<string, unknown>[] {
    return this.conditions.get(emergencyId)?.assessmentQuestions ?? [];
  }

  getEmergencyActions(emergencyId: string): EmergencyActions {
    const condition = this.conditions.get(emergencyId);
    return {
      dos: condition?.dos ?? [],
      donts: condition?.donts ?? [],
    };
  }

  getUrgentActions(emergencyId: string): readonly string[] {
    return this.conditions.get(emergencyId)?.urgentActions ?? [];
  }

  /**
   * Case-insensitive substring match on title, description and symptoms.
   * An empty query matches nothing.
   */
  searchEmergencyConditions(query: string): EmergencyCondition[] {
    if (!query) return [];
    const q = query.toLowerCase();
    return this.getAllEmergencyConditions().filter(
      c =>
        c.title.toLowerCase().includes(q) ||
        c.description.toLowerCase().includes(q) ||
        c.symptoms.some(s => s.toLowerCase().includes(q))
    );
  }

  /** Returns a copy; the shared records stay frozen. */
  getSeverityInfo(severity: string): SeverityInfo {
    const key = severity.toLowerCase();
    return { ...(isKnownSeverity(key) ? SEVERITY_INFO[key] : UNKNOWN_SEVERITY) };
  }

  getEmergencyAssessment(emergencyId: string): EmergencyAssessment | undefined {
    const condition = this.conditions.get(emergencyId);
    if (!condition) return undefined;

    const severity = this.getSeverityInfo(condition.severity);
    return {
      id: condition.id,
      title: condition.title,
      questions: this.parseQuestions(condition),
      advice: {
        dos: condition.dos,
        donts: condition.donts,
        description: condition.description || 'No description provided.',
      },
      isHighPriority: condition.severity.toLowerCase() === 'high',
      color: severity.color,
      icon: severity.icon,
    };
  }

  createAssessmentFlow(emergencyId: string): AssessmentFlow | undefined {
    const assessment = this.getEmergencyAssessment(emergencyId);
    if (!assessment) return undefined;
    return new AssessmentFlow(assessment.questions, this.logger);
  }

  private parseQuestions(condition: EmergencyCondition): AssessmentQuestion[] {
    const questions: AssessmentQuestion[] = [];
    condition.assessmentQuestions.forEach((raw, index) => {
      try {
        questions.push(parseAssessmentQuestion(raw, index));
      } catch (err) {
        this.logger.warn('Dropping malformed assessment question', {
          emergencyId: condition.id,
          index,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    });
    return questions;
  }

  private async load(): Promise<void> {
    try {
      const data = await this.assets.loadString(this.dataPath);
      const parsed = emergencyDocumentSchema.parse(JSON.parse(data));

      const table = new Map<string, EmergencyCondition>();
      for (const entry of parsed.emergencies) {
        if (isJsonObject(entry)) {
          const condition = parseEmergencyCondition(entry);
          table.set(condition.id, condition);
        }
      }

      this.install(table);
      this.logger.info(`Medical knowledge initialized with ${table.size} conditions`);
    } catch (err) {
      this.logger.error('Error initializing medical knowledge', err, { path: this.dataPath });
      this.install(new Map(FALLBACK_EMERGENCIES.map((c): [string, EmergencyCondition] => [c.id, c])));
      this.logger.info(`Created fallback medical knowledge dataset with ${this.conditions.size} conditions`);
    }
  }

  private install(table: Map<string, EmergencyCondition>): void {
    this.conditions = table;
    this.size.set(table.size);
    this.initialized.set(true);
  }
}
