export * from './auth.module';
export * from './auth.service';
export * from './constants';
export * from './guards/api-token.guard';
export * from './decorators/owner.decorator';
export * from './decorators/public.decorator';
export * from './interfaces/authenticated-request.interface';
