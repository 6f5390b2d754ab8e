import { isNil, omitBy } from 'lodash';
import { z } from 'zod';

import { TaskValidationError } from '../tasks/errors';

export const TRANSLATION_SERVICES = [
  'SiliconFlowFree',
  'OpenAI',
  'AzureOpenAI',
  'Gemini',
  'DeepL',
  'Ollama',
  'SiliconFlow',
  'DeepSeek',
  'Zhipu',
  'Claude',
  'Bing',
  'Google',
  'Tencent',
] as const;

export type TranslationService = (typeof TRANSLATION_SERVICES)[number];

interface ServiceOption {
  /** Key in the stored user settings. */
  setting: string;
  /** Key handed to the engine. */
  option: string;
  fallback?: string;
  required?: boolean;
}

const SERVICE_OPTIONS: Record<TranslationService, readonly ServiceOption[]> = {
  SiliconFlowFree: [],
  OpenAI: [
    { setting: 'openai_model', option: 'model', fallback: 'gpt-4o-mini' },
    { setting: 'openai_api_key', option: 'apiKey', required: true },
    {
      setting: 'openai_base_url',
      option: 'baseUrl',
      fallback: 'https://api.openai.com/v1',
    },
  ],
  AzureOpenAI: [
    { setting: 'azure_openai_api_key', option: 'apiKey', required: true },
    { setting: 'azure_openai_base_url', option: 'baseUrl', required: true },
    { setting: 'azure_openai_model', option: 'model' },
    {
      setting: 'azure_openai_api_version',
      option: 'apiVersion',
      fallback: '2024-02-15-preview',
    },
  ],
  Gemini: [
    { setting: 'gemini_model', option: 'model', fallback: 'gemini-1.5-flash' },
    { setting: 'gemini_api_key', option: 'apiKey', required: true },
  ],
  DeepL: [{ setting: 'deepl_api_key', option: 'authKey', required: true }],
  Ollama: [
    { setting: 'ollama_model', option: 'model', fallback: 'gemma2' },
    {
      setting: 'ollama_host',
      option: 'host',
      fallback: 'http://127.0.0.1:11434',
    },
  ],
  SiliconFlow: [
    {
      setting: 'siliconflow_model',
      option: 'model',
      fallback: 'Qwen/Qwen2.5-7B-Instruct',
    },
    { setting: 'siliconflow_api_key', option: 'apiKey', required: true },
  ],
  DeepSeek: [
    { setting: 'deepseek_model', option: 'model', fallback: 'deepseek-chat' },
    { setting: 'deepseek_api_key', option: 'apiKey', required: true },
  ],
  Zhipu: [
    { setting: 'zhipu_model', option: 'model', fallback: 'glm-4-flash' },
    { setting: 'zhipu_api_key', option: 'apiKey', required: true },
  ],
  Claude: [
    {
      setting: 'claude_model',
      option: 'model',
      fallback: 'claude-sonnet-4-20250514',
    },
    { setting: 'claude_api_key', option: 'apiKey', required: true },
  ],
  Bing: [],
  Google: [],
  Tencent: [
    { setting: 'tencent_secret_id', option: 'secretId', required: true },
    { setting: 'tencent_secret_key', option: 'secretKey', required: true },
  ],
};

const PAGE_RANGES = /^\d+(-\d+)?(,\d+(-\d+)?)*$/;

const translationConfigSchema = z
  .object({
    service: z.enum(TRANSLATION_SERVICES),
    serviceOptions: z.record(z.string()),
    langFrom: z.string().min(1),
    langTo: z.string().min(1),
    output: z.string().min(1),
    pages: z
      .string()
      .regex(PAGE_RANGES, 'expected page ranges such as "1-3,5"')
      .optional(),
    qps: z.number().int().positive(),
    ignoreCache: z.boolean(),
    minTextLength: z.number().int().nonnegative(),
    customSystemPrompt: z.string().optional(),
    noMono: z.boolean(),
    noDual: z.boolean(),
    dualTranslateFirst: z.boolean(),
    translateTableText: z.boolean(),
    ocrWorkaround: z.boolean(),
    skipClean: z.boolean(),
    onlyTranslatedPages: z.boolean(),
  })
  .refine((config) => !(config.noMono && config.noDual), {
    message: 'noMono and noDual cannot both be set',
    path: ['noDual'],
  });

export type TranslationConfig = z.infer<typeof translationConfigSchema>;

function pick(settings: Record<string, unknown>, key: string): unknown {
  const value = settings[key];
  return value === '' ? undefined : value;
}

/**
 * Builds the engine configuration for one run: stored user settings, then
 * the task's overrides on top, then the output directory.
 *
 * @throws TaskValidationError when the merged settings are not usable.
 */
export function buildTranslationConfig(
  userSettings: Record<string, unknown>,
  overrides: Record<string, unknown>,
  output: string,
): TranslationConfig {
  const settings: Record<string, unknown> = {
    ...userSettings,
    ...omitBy(overrides, isNil),
  };

  const serviceSetting = pick(settings, 'service') ?? 'SiliconFlowFree';
  const service = z.enum(TRANSLATION_SERVICES).safeParse(serviceSetting);
  if (!service.success) {
    throw new TaskValidationError(
      `Invalid translation settings: unknown service "${String(serviceSetting)}"`,
    );
  }

  const serviceOptions: Record<string, unknown> = {};
  const missing: string[] = [];
  for (const option of SERVICE_OPTIONS[service.data]) {
    const value = pick(settings, option.setting) ?? option.fallback;
    if (value === undefined) {
      if (option.required) {
        missing.push(option.setting);
      }
      continue;
    }
    serviceOptions[option.option] = value;
  }
  if (missing.length > 0) {
    throw new TaskValidationError(
      `Invalid translation settings: ${service.data} requires ${missing.join(', ')}`,
    );
  }

  const parsed = translationConfigSchema.safeParse({
    service: service.data,
    serviceOptions,
    langFrom: pick(settings, 'lang_from') ?? 'en',
    langTo: pick(settings, 'lang_to') ?? 'zh',
    output,
    pages: pick(settings, 'pages'),
    qps: pick(settings, 'custom_qps') ?? pick(settings, 'qps') ?? 4,
    ignoreCache: pick(settings, 'ignore_cache') ?? false,
    minTextLength: pick(settings, 'min_text_length') ?? 5,
    customSystemPrompt: pick(settings, 'custom_system_prompt'),
    noMono: pick(settings, 'no_mono') ?? false,
    noDual: pick(settings, 'no_dual') ?? false,
    dualTranslateFirst: pick(settings, 'dual_translate_first') ?? false,
    translateTableText:
      pick(settings, 'translate_tables') ??
      pick(settings, 'translate_table_text') ??
      true,
    ocrWorkaround: pick(settings, 'ocr_workaround') ?? false,
    skipClean: pick(settings, 'skip_clean') ?? false,
    onlyTranslatedPages: pick(settings, 'only_translated_pages') ?? false,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new TaskValidationError(`Invalid translation settings: ${detail}`);
  }
  return parsed.data;
}
