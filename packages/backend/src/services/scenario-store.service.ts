import { NotFoundError, ValidationError } from '../lib/errors.js';
import type { ScenarioRepository } from '../storage/types.js';
import type { Scenario, ScenarioId } from '../types/index.js';

export const MAX_DISPLAY_NAME_LENGTH = 80;

export interface ScenarioStoreOptions {
  maxTextLength: number;
  now?: () => Date;
}

/**
 * Trim an optional display name; blank becomes null.
 */
export function normalizeDisplayName(name: string | undefined, field: string): string | null {
  const trimmed = name?.trim() ?? '';
  if (trimmed.length === 0) {
    return null;
  }
  if (trimmed.length > MAX_DISPLAY_NAME_LENGTH) {
    throw new ValidationError(
      `${field} must be at most ${MAX_DISPLAY_NAME_LENGTH} characters`,
      { field, maxLength: MAX_DISPLAY_NAME_LENGTH }
    );
  }
  return trimmed;
}

export class ScenarioStore {
  private readonly now: () => Date;

  constructor(
    private readonly repository: ScenarioRepository,
    private readonly options: ScenarioStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get maxTextLength(): number {
    return this.options.maxTextLength;
  }

  /**
   * Record a new scenario. The text is stored exactly as given;
   * whitespace-only text counts as empty.
   */
  async submit(text: string, submittedBy?: string): Promise<Scenario> {
    if (text.trim().length === 0) {
      throw new ValidationError('Scenario text must not be empty', { field: 'text' });
    }

    if (text.length > this.options.maxTextLength) {
      throw new ValidationError(
        `Scenario text must be at most ${this.options.maxTextLength} characters`,
        { field: 'text', maxLength: this.options.maxTextLength, length: text.length }
      );
    }

    return this.repository.create({
      text,
      submittedBy: normalizeDisplayName(submittedBy, 'submittedBy'),
      submittedAt: this.now().toISOString(),
    });
  }

  async list(): Promise<Scenario[]> {
    return this.repository.findAll();
  }

  async find(id: ScenarioId): Promise<Scenario | null> {
    return this.repository.findById(id);
  }

  async get(id: ScenarioId): Promise<Scenario> {
    const scenario = await this.find(id);
    if (!scenario) {
      throw new NotFoundError('Scenario', id);
    }
    return scenario;
  }

  async clear(): Promise<void> {
    await this.repository.clear();
  }
}
