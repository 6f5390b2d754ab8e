import { Controller, Get } from '@nestjs/common';

import { StatusResponse } from '@libs/interfaces';

import { Public } from '../auth';

@Controller()
export class AppController {
  /**
   * Liveness check.
   */
  @Public()
  @Get()
  public getStatus(): StatusResponse {
    return { status: 'OK' };
  }
}
