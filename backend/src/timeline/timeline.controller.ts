// pulse-director/backend/src/timeline/timeline.controller.ts
import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { calculateDifficulty, Difficulty } from './difficulty';
import { CreateTimelineDto } from './dto/timeline.dto';
import { TimelineLibraryService, TimelineSummary } from './timeline-library.service';
import { TimelineModel } from './timeline-model';
import { TimelineDefinition, TimelineValidationError } from './timeline.types';

export interface TimelineResponse {
  timeline: TimelineDefinition;
  difficulty: Difficulty;
}

@Controller('timelines')
export class TimelineController {
  private readonly logger = new Logger(TimelineController.name);

  constructor(private readonly library: TimelineLibraryService) {}

  /**
   * List built-in and custom timelines
   * GET /api/timelines
   */
  @Get()
  list(): TimelineSummary[] {
    return this.library.list();
  }

  /**
   * Get a timeline with its difficulty and XP
   * GET /api/timelines/:id
   */
  @Get(':id')
  get(@Param('id') id: string): TimelineResponse {
    const model = this.library.get(id);
    if (!model) {
      throw new NotFoundException(`Timeline ${id} not found`);
    }
    return this.describe(model);
  }

  /**
   * Register a custom timeline
   * POST /api/timelines
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  create(@Body() body: CreateTimelineDto): TimelineResponse {
    this.logger.log(`Registering timeline: ${body.name}`);
    try {
      return this.describe(this.library.register(body));
    } catch (error) {
      if (error instanceof TimelineValidationError) {
        throw new BadRequestException({ message: error.message, problems: error.problems });
      }
      throw error;
    }
  }

  /**
   * Delete a custom timeline; built-in timelines answer 409
   * DELETE /api/timelines/:id
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id') id: string): void {
    if (this.library.isBuiltIn(id)) {
      throw new ConflictException(`Timeline ${id} is built in and cannot be deleted`);
    }
    if (!this.library.remove(id)) {
      throw new NotFoundException(`Custom timeline ${id} not found`);
    }
  }

  private describe(model: TimelineModel): TimelineResponse {
    return { timeline: model.toDefinition(), difficulty: calculateDifficulty(model) };
  }
}
