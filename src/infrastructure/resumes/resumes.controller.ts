import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { CreateResumeUseCase } from '@application/use-cases/create-resume.use-case';
import { DeleteResumeUseCase } from '@application/use-cases/delete-resume.use-case';
import { GetResumeUseCase } from '@application/use-cases/get-resume.use-case';
import {
  DEFAULT_LIST_LIMIT,
  ListResumesUseCase,
} from '@application/use-cases/list-resumes.use-case';
import { TailorResumeUseCase } from '@application/use-cases/tailor-resume.use-case';
import { UpdateResumeStatusUseCase } from '@application/use-cases/update-resume-status.use-case';
import { CallerId, DisconnectSignal } from './request-params';
import {
  CreateResumeDto,
  ListResumesQueryDto,
  TailorResumeDto,
  UpdateResumeStatusDto,
} from './resume.dto';
import { ResumeListResponse, ResumeResponse, toResumeResponse } from './resume.presenter';

@Controller('resumes')
export class ResumesController {
  constructor(
    private readonly createResume: CreateResumeUseCase,
    private readonly listResumes: ListResumesUseCase,
    private readonly tailorResume: TailorResumeUseCase,
    private readonly updateResumeStatus: UpdateResumeStatusUseCase,
    private readonly getResume: GetResumeUseCase,
    private readonly deleteResume: DeleteResumeUseCase
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CallerId() userId: string,
    @Body() body: CreateResumeDto
  ): Promise<ResumeResponse> {
    const resume = await this.createResume.execute({ userId, ...body });
    return toResumeResponse(resume);
  }

  @Get()
  async list(
    @CallerId() userId: string,
    @Query() query: ListResumesQueryDto
  ): Promise<ResumeListResponse> {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;
    const offset = query.offset ?? 0;
    const page = await this.listResumes.execute({
      userId,
      status: query.status,
      limit,
      offset,
    });
    return { items: page.items.map(toResumeResponse), total: page.total, limit, offset };
  }

  @Get(':id')
  async get(@CallerId() userId: string, @Param('id') id: string): Promise<ResumeResponse> {
    const resume = await this.getResume.execute({ resumeId: id, userId });
    return toResumeResponse(resume);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@CallerId() userId: string, @Param('id') id: string): Promise<void> {
    await this.deleteResume.execute({ resumeId: id, userId });
  }

  @Post(':id/tailor')
  @HttpCode(HttpStatus.OK)
  async tailor(
    @CallerId() userId: string,
    @Param('id') resumeId: string,
    @Body() options: TailorResumeDto,
    @DisconnectSignal() signal: AbortSignal
  ): Promise<ResumeResponse> {
    const resume = await this.tailorResume.execute({ resumeId, userId, options, signal });
    return toResumeResponse(resume);
  }

  @Patch(':id/status')
  async updateStatus(
    @CallerId() userId: string,
    @Param('id') resumeId: string,
    @Body() body: UpdateResumeStatusDto
  ): Promise<ResumeResponse> {
    const resume = await this.updateResumeStatus.execute({
      resumeId,
      userId,
      status: body.status,
      notes: body.notes,
    });
    return toResumeResponse(resume);
  }
}
