import type { EmergencyCondition } from './emergency-condition.schema';

// Installed when the bundled dataset cannot be loaded.
export const FALLBACK_EMERGENCIES: readonly EmergencyCondition[] = [
  {
    id: 'heart_attack',
    title: 'Heart Attack',
    description: 'A heart attack occurs when blood flow to part of the heart is blocked.',
    severity: 'high',
    symptoms: ['Chest pain', 'Shortness of breath', 'Sweating', 'Nausea'],
    dos: ['Call emergency services immediately', 'Stay calm', 'Take aspirin if not allergic'],
    donts: ["Don't leave the person alone", "Don't delay seeking help"],
    assessmentQuestions: [],
    urgentActions: ['Call emergency services immediately', 'Help the person sit comfortably'],
  },
  {
    id: 'stroke',
    title: 'Stroke',
    description: 'A stroke occurs when blood supply to part of the brain is interrupted.',
    severity: 'high',
    symptoms: ['Sudden numbness', 'Confusion', 'Trouble speaking', 'Severe headache'],
    dos: ['Call emergency services immediately', 'Note when symptoms started'],
    donts: ["Don't give food or drink", "Don't delay medical attention"],
    assessmentQuestions: [],
    urgentActions: ['Call emergency services immediately'],
  },
];
