import { registerAs } from '@nestjs/config';
import { env } from 'process';

export default registerAs('engine', () => ({
  command: env.ENGINE_COMMAND || 'pdf-translate-engine',
  args: env.ENGINE_ARGS || '',
}));
