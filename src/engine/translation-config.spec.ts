import { TaskValidationError } from '../tasks/errors';
import { buildTranslationConfig } from './translation-config';

describe('buildTranslationConfig', () => {
  it('uses the free service and defaults for empty settings', () => {
    expect(buildTranslationConfig({}, {}, '/data/out')).toEqual({
      service: 'SiliconFlowFree',
      serviceOptions: {},
      langFrom: 'en',
      langTo: 'zh',
      output: '/data/out',
      qps: 4,
      ignoreCache: false,
      minTextLength: 5,
      noMono: false,
      noDual: false,
      dualTranslateFirst: false,
      translateTableText: true,
      ocrWorkaround: false,
      skipClean: false,
      onlyTranslatedPages: false,
    });
  });

  it('maps service credentials and applies their fallbacks', () => {
    const config = buildTranslationConfig(
      { service: 'OpenAI', openai_api_key: 'test-key', openai_model: '' },
      {},
      '/data/out',
    );

    expect(config.serviceOptions).toEqual({
      model: 'gpt-4o-mini',
      apiKey: 'test-key',
      baseUrl: 'https://api.openai.com/v1',
    });
  });

  it('lets task overrides win over stored settings, except for nulls', () => {
    const config = buildTranslationConfig(
      { lang_to: 'zh', pages: '1-3', custom_qps: 8, qps: 2 },
      { lang_to: 'ja', pages: null, ocr_workaround: true },
      '/data/out',
    );

    expect(config).toMatchObject({
      langTo: 'ja',
      pages: '1-3',
      qps: 8,
      ocrWorkaround: true,
    });
  });

  it('lists every missing required credential', () => {
    expect(() =>
      buildTranslationConfig({ service: 'Tencent' }, {}, '/data/out'),
    ).toThrow(
      'Invalid translation settings: Tencent requires tencent_secret_id, tencent_secret_key',
    );
  });

  it('rejects an unknown service', () => {
    const build = () =>
      buildTranslationConfig({}, { service: 'Babelfish' }, '/data/out');

    expect(build).toThrow(TaskValidationError);
    expect(build).toThrow(
      'Invalid translation settings: unknown service "Babelfish"',
    );
  });

  it.each([
    [{ pages: '1-3,x' }, 'pages: expected page ranges such as "1-3,5"'],
    [{ qps: 'fast' }, 'qps: Expected number, received string'],
    [
      { no_mono: true, no_dual: true },
      'noDual: noMono and noDual cannot both be set',
    ],
  ])('rejects %j', (settings, detail) => {
    expect(() => buildTranslationConfig(settings, {}, '/data/out')).toThrow(
      `Invalid translation settings: ${detail}`,
    );
  });
});
