import { ComplaintIntake } from '../entities/Complaint.js';
import { ValidationError } from '../../infrastructure/errors/ComplaintDeskError.js';

export type IntakeField = keyof ComplaintIntake;

interface IntakeQuestion {
  readonly field: IntakeField;
  readonly label: string;
  readonly prompt: string;
}

/**
 * Questions in the order they are asked
 */
export const INTAKE_QUESTIONS: readonly IntakeQuestion[] = [
  { field: 'name', label: 'Name', prompt: 'Please say your name.' },
  { field: 'mobileNumber', label: 'Mobile Number', prompt: 'Please say your mobile number.' },
  { field: 'location', label: 'Location', prompt: 'Please say your location.' },
  { field: 'complaintType', label: 'Complaint Type', prompt: 'What type of complaint do you have?' },
  { field: 'complaintDescription', label: 'Complaint Description', prompt: 'Please describe your complaint.' }
];

export const WELCOME_MESSAGE =
  "Hello! I am your complaint assistant. I'll ask you a few questions to file your complaint.";
export const COMPLETION_MESSAGE =
  'Thank you! Your complaint has been recorded. Review the form data and submit your complaint.';
export const NOTHING_TO_CLEAR_MESSAGE = 'No responses have been recorded yet.';

const MOBILE_NUMBER_LENGTH = 10;

export interface IntakeTurn {
  /** Whether the call changed the session: an answer stored, or one cleared */
  readonly accepted: boolean;
  /** What to say next: the next prompt, a re-prompt, or the completion message */
  readonly message: string;
  readonly complete: boolean;
  readonly progress: IntakeProgress;
}

export interface IntakeProgress {
  readonly answered: number;
  readonly total: number;
}

/**
 * Check one answer; returns the reason it is rejected, or null
 */
export function validateAnswer(field: IntakeField, response: string): string | null {
  if (!response || response.trim() === '') {
    return 'Please provide a response';
  }

  if (field === 'mobileNumber') {
    const cleaned = response.replace(/[ \-+]/g, '');
    if (!/^\d+$/.test(cleaned)) {
      return 'Please enter a valid mobile number';
    }
    if (cleaned.length !== MOBILE_NUMBER_LENGTH) {
      return `Mobile number should be ${MOBILE_NUMBER_LENGTH} digits`;
    }
  }

  return null;
}

/**
 * Guided intake: asks the five questions in order, re-asking on invalid
 * or missed answers. Answers may be edited during review.
 */
export class IntakeSession {
  private readonly answers = new Map<IntakeField, string>();
  private index = 0;

  get complete(): boolean {
    return this.index >= INTAKE_QUESTIONS.length;
  }

  get currentQuestion(): IntakeQuestion | null {
    return this.complete ? null : INTAKE_QUESTIONS[this.index];
  }

  get progress(): IntakeProgress {
    return { answered: this.index, total: INTAKE_QUESTIONS.length };
  }

  /**
   * Opening line plus the first question
   */
  start(): string {
    return `${WELCOME_MESSAGE} ${INTAKE_QUESTIONS[0].prompt}`;
  }

  answer(response: string): IntakeTurn {
    const question = this.currentQuestion;
    if (!question) {
      return this.turn(false, COMPLETION_MESSAGE);
    }

    const problem = validateAnswer(question.field, response);
    if (problem) {
      return this.turn(false, `${problem}. ${question.prompt}`);
    }

    this.answers.set(question.field, response.trim());
    this.index += 1;

    const next = this.currentQuestion;
    return this.turn(true, next ? next.prompt : COMPLETION_MESSAGE);
  }

  /**
   * Nothing usable was captured (timeout, unrecognised speech): ask again
   */
  missed(): IntakeTurn {
    const question = this.currentQuestion;
    if (!question) {
      return this.turn(false, COMPLETION_MESSAGE);
    }
    return this.turn(false, `Sorry, I didn't catch that. ${question.prompt}`);
  }

  /**
   * Drop the most recent answer and ask that question again
   */
  clearLast(): IntakeTurn {
    if (this.index === 0) {
      return this.turn(false, NOTHING_TO_CLEAR_MESSAGE);
    }
    this.index -= 1;
    const question = INTAKE_QUESTIONS[this.index];
    this.answers.delete(question.field);
    return this.turn(true, `Please provide your answer again. ${question.prompt}`);
  }

  /**
   * Forget every answer and start over from the welcome line
   */
  reset(): string {
    this.answers.clear();
    this.index = 0;
    return this.start();
  }

  /**
   * Change an already answered field
   * @throws ValidationError if the field is unanswered or the value invalid
   */
  edit(field: IntakeField, value: string): void {
    const label = labelOf(field);
    if (!this.answers.has(field)) {
      throw new ValidationError(`${label} has not been answered yet`, label);
    }
    const problem = validateAnswer(field, value);
    if (problem) {
      throw new ValidationError(problem, label);
    }
    this.answers.set(field, value.trim());
  }

  /**
   * Answers collected so far, keyed by label
   */
  review(): Record<string, string> {
    const review: Record<string, string> = {};
    for (const question of INTAKE_QUESTIONS) {
      review[question.label] = this.answers.get(question.field) ?? '';
    }
    return review;
  }

  /**
   * @throws ValidationError naming the first missing field
   */
  toIntake(): ComplaintIntake {
    for (const question of INTAKE_QUESTIONS) {
      if (!this.answers.get(question.field)) {
        throw new ValidationError(`Please provide ${question.label}.`, question.label);
      }
    }
    return {
      name: this.answers.get('name') ?? '',
      mobileNumber: this.answers.get('mobileNumber') ?? '',
      location: this.answers.get('location') ?? '',
      complaintType: this.answers.get('complaintType') ?? '',
      complaintDescription: this.answers.get('complaintDescription') ?? ''
    };
  }

  private turn(accepted: boolean, message: string): IntakeTurn {
    return { accepted, message, complete: this.complete, progress: this.progress };
  }
}

export function labelOf(field: IntakeField): string {
  return INTAKE_QUESTIONS.find(question => question.field === field)?.label ?? field;
}
