import { Inject, Injectable } from '@nestjs/common';
import { ValidationErrors } from '@domain/errors/domain.errors';
import { parseResumeStatus } from '@domain/services/resume-status-machine';
import { IResumeRepository, ResumePage } from '../ports/resume-repository.port';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 100;

export interface ListResumesInput {
  userId: string;
  status?: string;
  limit?: number;
  offset?: number;
}

@Injectable()
export class ListResumesUseCase {
  constructor(
    @Inject('IResumeRepository')
    private readonly resumeRepository: IResumeRepository
  ) {}

  async execute(input: ListResumesInput): Promise<ResumePage> {
    const limit = input.limit ?? DEFAULT_LIST_LIMIT;
    const offset = input.offset ?? 0;

    const errors = new ValidationErrors();
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      errors.addFieldError('limit', `must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      errors.addFieldError('offset', 'must be a non-negative integer');
    }
    errors.throwIfAny();

    const status = input.status ? parseResumeStatus(input.status) : undefined;
    return this.resumeRepository.findByUserId(input.userId, { limit, offset, status });
  }
}
