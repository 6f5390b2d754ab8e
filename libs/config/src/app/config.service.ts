import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class AppConfigService {
  constructor(private readonly config: ConfigService) {}

  public get env(): string {
    return this.config.getOrThrow<string>('app.env');
  }

  public get isProd(): boolean {
    return this.env === 'production';
  }

  public get host(): string {
    return this.config.getOrThrow<string>('app.host');
  }

  public get port(): number {
    return parseInt(String(this.config.getOrThrow<string>('app.port')), 10);
  }

  public get globalPrefix(): string {
    return this.config.get<string>('app.globalPrefix') || 'api/v1';
  }

  /**
   * Key used to verify owner tokens. Required once a protected route is hit.
   */
  public get secretKey(): string {
    return this.config.getOrThrow<string>('app.secretKey');
  }
}
