import {
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  Logger,
  NotFoundException,
  Param,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import type { DeletedResponse, TaskCreatedResponse } from '@libs/interfaces';

import { Owner } from '../auth';
import { StorageService } from '../storage';
import { CreateTaskDto } from './dto';
import { TaskNotFoundError, TaskStateError } from './errors';
import { HistoryImportService } from './history-import.service';
import type { TaskStreamMessage, TaskView } from './interfaces';
import { TaskStreamService } from './task-stream.service';
import { TasksProcessor } from './tasks.processor';
import { TasksService, toTaskView } from './tasks.service';

@Controller('tasks')
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(
    private readonly tasksService: TasksService,
    private readonly processor: TasksProcessor,
    private readonly streams: TaskStreamService,
    private readonly storage: StorageService,
    private readonly historyImport: HistoryImportService,
  ) {}

  /**
   * Queues a translation of a previously uploaded file.
   */
  @Post()
  public async createTask(
    @Owner() owner: string,
    @Body() dto: CreateTaskDto,
  ): Promise<TaskCreatedResponse> {
    const upload = await this.storage.findUpload(owner, dto.fileId);
    if (!upload) {
      throw new NotFoundException(`File ${dto.fileId} not found`);
    }

    const overrides = dto.settings ?? {};
    const taskId = await this.tasksService.create({
      owner,
      fileId: dto.fileId,
      displayName: upload.displayName,
      settingsSnapshot: overrides,
    });

    this.processor.enqueue({
      taskId,
      owner,
      inputPath: upload.path,
      displayName: upload.displayName,
      overrides,
    });

    return { taskId };
  }

  /**
   * Translation history, newest first.
   */
  @Get()
  public async listTasks(@Owner() owner: string): Promise<TaskView[]> {
    await this.historyImport.importForOwner(owner);
    const tasks = await this.tasksService.listByOwner(owner);
    return tasks.map(toTaskView);
  }

  /**
   * Polling fallback for clients that cannot hold a stream open.
   */
  @Get(':id')
  public async getTask(
    @Owner() owner: string,
    @Param('id') id: string,
  ): Promise<TaskView> {
    try {
      return toTaskView(await this.tasksService.getOwned(id, owner));
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  @Delete(':id')
  public async deleteTask(
    @Owner() owner: string,
    @Param('id') id: string,
  ): Promise<DeletedResponse> {
    let deleted: boolean;
    try {
      deleted = await this.tasksService.delete(id, owner);
    } catch (error) {
      throw this.toHttpException(error);
    }

    if (!deleted) {
      throw new NotFoundException(`Task ${id} not found`);
    }
    return { deleted: true };
  }

  /**
   * Server-sent progress events. The token may be passed as `?token=`
   * because EventSource cannot set headers.
   */
  @Get(':id/stream')
  public async streamTask(
    @Owner() owner: string,
    @Param('id') id: string,
    @Req() req: Request,
    @Res() res: Response,
  ): Promise<void> {
    const disconnected = new AbortController();

    let messages: AsyncGenerator<TaskStreamMessage, void, undefined>;
    try {
      messages = await this.streams.attach(id, owner, disconnected.signal);
    } catch (error) {
      throw this.toHttpException(error);
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    req.on('close', () => disconnected.abort());

    try {
      for await (const message of messages) {
        res.write(`event: ${message.type}\ndata: ${JSON.stringify(message)}\n\n`);
      }
    } catch (error) {
      this.logger.error(
        `Stream for task ${id} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    } finally {
      disconnected.abort();
      res.end();
    }
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof TaskNotFoundError) {
      return new NotFoundException(error.message);
    }
    if (error instanceof TaskStateError) {
      return new ConflictException(error.message);
    }
    return error;
  }
}
