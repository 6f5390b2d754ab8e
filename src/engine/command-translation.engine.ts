import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'child_process';
import { createInterface } from 'readline';

import { EngineConfigService } from '@libs/config';

import type { TranslationConfig } from './translation-config';
import type { TranslationEngine } from './translation-engine.interface';

const STDERR_TAIL_LENGTH = 2000;

type ProcessExit =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'spawn_error'; error: Error };

/**
 * Runs the engine as a child process. The configuration goes to stdin as
 * one JSON document; every stdout line is one JSON event.
 */
@Injectable()
export class CommandTranslationEngine implements TranslationEngine {
  private readonly logger = new Logger(CommandTranslationEngine.name);

  constructor(private readonly engineConfig: EngineConfigService) {}

  public async *run(
    config: TranslationConfig,
    inputPath: string,
  ): AsyncGenerator<unknown> {
    const command = this.engineConfig.command;
    const child = spawn(command, [...this.engineConfig.args, inputPath], {
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_LENGTH);
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once('error', (error) => resolve({ kind: 'spawn_error', error }));
      child.once('close', (code, signal) =>
        resolve({ kind: 'exit', code, signal }),
      );
    });

    child.stdin.on('error', (error) => {
      this.logger.warn(`Engine stdin closed early: ${error.message}`);
    });
    child.stdin.end(JSON.stringify(config));

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(trimmed);
        } catch {
          this.logger.debug(`Ignoring non-JSON engine output: ${trimmed}`);
          continue;
        }
        yield parsed;
      }

      const exit = await exited;
      if (exit.kind === 'spawn_error') {
        yield {
          type: 'error',
          error_detail: `Failed to start ${command}: ${exit.error.message}`,
        };
        return;
      }
      if (exit.code !== 0) {
        const tail = stderr.trim();
        yield {
          type: 'error',
          error_detail:
            tail ||
            `${command} exited with ${exit.signal ?? `code ${exit.code}`}`,
        };
      }
    } finally {
      lines.close();
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    }
  }
}
