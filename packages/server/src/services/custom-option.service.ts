import type { Database } from 'better-sqlite3';
import {
  BUILTIN_CHOICES,
  OPTION_TYPES,
  OPTION_TYPE_LABELS,
  slugifySectionName,
  type Choice,
  type CreateCustomOptionInput,
  type CustomOption,
  type OptionType,
} from '@showdesk/shared';
import { CustomOptionRepository } from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { ConflictError, NotFoundError, ValidationError } from '../types/errors.js';
import type { RequestCache } from './request-cache.js';

export interface OptionTypeSummary {
  type: OptionType;
  label: string;
}

/**
 * Built-in choice lists, extended per user with custom options.
 */
export class CustomOptionService {
  private db: Database;
  private optionRepo: CustomOptionRepository;

  constructor(db: Database) {
    this.db = db;
    this.optionRepo = new CustomOptionRepository(db);
  }

  listTypes(): OptionTypeSummary[] {
    return OPTION_TYPES.map((type) => ({ type, label: OPTION_TYPE_LABELS[type] }));
  }

  /**
   * Built-in choices first, then the user's custom ones by label.
   */
  getChoices(userId: number, type: OptionType, cache?: RequestCache): Choice[] {
    const load = (): Choice[] => [
      ...BUILTIN_CHOICES[type].map((choice) => ({ ...choice, is_custom: false })),
      ...this.optionRepo
        .findByUserAndType(userId, type)
        .map((option) => ({ value: option.value, label: option.label, is_custom: true })),
    ];
    return cache ? cache.choiceList(`${userId}:${type}`, load) : load();
  }

  listCustom(userId: number): Record<OptionType, CustomOption[]> {
    const grouped: Record<OptionType, CustomOption[]> = {
      inventory_category: [],
      inventory_status: [],
      company_category: [],
      collab_type: [],
      deal_type: [],
      contact_role: [],
    };
    for (const option of this.optionRepo.findByUser(userId)) {
      const type = OPTION_TYPES.find((candidate) => candidate === option.option_type);
      if (type) {
        grouped[type].push(option);
      }
    }
    return grouped;
  }

  create(userId: number, input: CreateCustomOptionInput): CustomOption {
    const value = slugifySectionName(input.label);
    if (value === '') {
      throw new ValidationError('Label must contain at least one letter or digit');
    }

    return runInTransaction(this.db, () => {
      const taken = this.getChoices(userId, input.option_type).some(
        (choice) => choice.value === value
      );
      if (taken) {
        throw new ConflictError(`"${input.label}" already exists for ${OPTION_TYPE_LABELS[input.option_type]}`);
      }
      return this.optionRepo.create({
        user_id: userId,
        option_type: input.option_type,
        value,
        label: input.label,
      });
    });
  }

  delete(userId: number, id: number): void {
    const option = this.optionRepo.findOwned(userId, id);
    if (!option) {
      throw new NotFoundError('Custom option', id);
    }
    this.optionRepo.delete(option.id);
  }
}
