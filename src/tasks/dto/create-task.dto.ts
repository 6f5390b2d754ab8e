import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

export class CreateTaskDto {
  @IsString()
  @IsNotEmpty()
  fileId!: string;

  /**
   * Per-run overrides of the stored user settings, e.g. `pages` or
   * `lang_to`.
   */
  @IsOptional()
  @IsObject()
  settings?: Record<string, unknown>;
}
