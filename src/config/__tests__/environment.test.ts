import { loadEnvironmentConfig } from '../environment';
import { PipelineConfigError } from '../../utils/errors';

describe('loadEnvironmentConfig', () => {
  it('should apply defaults when only the input path is set', () => {
    const config = loadEnvironmentConfig({ PIPELINE_INPUT_PATH: 'data/raw.json' });

    expect(config).toEqual({
      pipeline: { inputPath: 'data/raw.json', outputDir: 'output' },
      cleaning: {
        textFields: ['heading', 'title', 'content', 'description', 'url', 'link', 'guid'],
        dateFields: ['pubDate']
      },
      validation: {
        requiredFields: ['heading', 'content', 'url'],
        contentMinLength: 20
      },
      logging: { level: 'info' }
    });
  });

  it('should parse comma-separated field lists and numeric settings', () => {
    const config = loadEnvironmentConfig({
      PIPELINE_INPUT_PATH: 'in.json',
      PIPELINE_OUTPUT_DIR: 'out',
      PIPELINE_TEXT_FIELDS: ' heading , content ,',
      PIPELINE_DATE_FIELDS: 'pubDate,updated',
      PIPELINE_REQUIRED_FIELDS: 'heading,url',
      PIPELINE_CONTENT_MIN_LENGTH: '50',
      LOG_LEVEL: 'debug'
    });

    expect(config.pipeline.outputDir).toBe('out');
    expect(config.cleaning.textFields).toEqual(['heading', 'content']);
    expect(config.cleaning.dateFields).toEqual(['pubDate', 'updated']);
    expect(config.validation.requiredFields).toEqual(['heading', 'url']);
    expect(config.validation.contentMinLength).toBe(50);
    expect(config.logging.level).toBe('debug');
  });

  it('should throw when the input path is missing', () => {
    expect(() => loadEnvironmentConfig({})).toThrow(PipelineConfigError);
    expect(() => loadEnvironmentConfig({})).toThrow('Missing required environment variables: PIPELINE_INPUT_PATH');
  });

  it('should reject malformed values', () => {
    const base = { PIPELINE_INPUT_PATH: 'in.json' };

    expect(() => loadEnvironmentConfig({ ...base, PIPELINE_CONTENT_MIN_LENGTH: 'twenty' })).toThrow(PipelineConfigError);
    expect(() => loadEnvironmentConfig({ ...base, PIPELINE_CONTENT_MIN_LENGTH: '0' })).toThrow(PipelineConfigError);
    expect(() => loadEnvironmentConfig({ ...base, PIPELINE_REQUIRED_FIELDS: ' , ' })).toThrow(PipelineConfigError);
    expect(() => loadEnvironmentConfig({ ...base, LOG_LEVEL: 'verbose' })).toThrow(PipelineConfigError);
  });
});
