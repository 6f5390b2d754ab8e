import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class TasksConfigService {
  constructor(private readonly config: ConfigService) {}

  /**
   * Number of translation runs allowed inside the engine at once.
   */
  public get maxConcurrent(): number {
    return this.positiveInt('tasks.maxConcurrent', 1);
  }

  /**
   * Root of the per-user uploads, outputs, settings and legacy history.
   */
  public get dataDir(): string {
    return this.config.get<string>('tasks.dataDir', 'data');
  }

  /**
   * Idle window after which an open progress stream sends a keepalive.
   */
  public get streamKeepaliveMs(): number {
    return this.positiveInt('tasks.streamKeepaliveMs', 30000);
  }

  /**
   * Events buffered per observer before further events are dropped.
   */
  public get channelCapacity(): number {
    return this.positiveInt('tasks.channelCapacity', 100);
  }

  private positiveInt(path: string, fallback: number): number {
    const raw = this.config.get<string | number>(path);
    const value = parseInt(String(raw ?? fallback), 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
  }
}
