import type { TranslationConfig, TranslationEngine } from '../engine';
import type { SettingsProvider, UserSettings } from '../settings';

export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/**
 * Lets pending promise callbacks and timers queued for "now" run.
 */
export async function flush(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

export type EngineScript = (
  config: TranslationConfig,
  inputPath: string,
) => AsyncIterable<unknown>;

export interface EngineRun {
  config: TranslationConfig;
  inputPath: string;
}

/**
 * Engine double that replays a script per input path.
 */
export class FakeTranslationEngine implements TranslationEngine {
  public readonly runs: EngineRun[] = [];
  private readonly scripts = new Map<string, EngineScript>();

  constructor(private readonly fallback?: EngineScript) {}

  public script(inputPath: string, script: EngineScript): this {
    this.scripts.set(inputPath, script);
    return this;
  }

  public run(config: TranslationConfig, inputPath: string): AsyncIterable<unknown> {
    this.runs.push({ config, inputPath });
    const script = this.scripts.get(inputPath) ?? this.fallback;
    if (!script) {
      throw new Error(`No engine script for ${inputPath}`);
    }
    return script(config, inputPath);
  }
}

export class FakeSettingsProvider implements SettingsProvider {
  public readonly reads: string[] = [];

  constructor(private readonly settings: Record<string, UserSettings> = {}) {}

  public async get(owner: string): Promise<UserSettings> {
    this.reads.push(owner);
    return this.settings[owner] ?? {};
  }
}

/**
 * Polls `check` until it holds, letting I/O and timers run in between.
 */
export async function waitFor(
  check: () => boolean | Promise<boolean>,
  attempts = 500,
): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (await check()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
  throw new Error('Condition not met in time');
}
