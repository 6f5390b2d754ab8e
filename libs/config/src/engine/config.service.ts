import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class EngineConfigService {
  constructor(private readonly config: ConfigService) {}

  public get command(): string {
    return this.config.getOrThrow<string>('engine.command');
  }

  public get args(): string[] {
    return this.config
      .get<string>('engine.args', '')
      .split(/\s+/)
      .filter((arg) => arg.length > 0);
  }
}
