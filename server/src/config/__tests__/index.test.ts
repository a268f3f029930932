import { describe, it, expect } from 'vitest';
import path from 'path';
import { buildConfig, config, findMissingSettings, SERVER_ROOT, validateConfig } from '../index';
import { ConfigError } from '../../utils/errors';

describe('buildConfig', () => {
  const defaults = buildConfig({});

  it('should apply defaults for an empty environment', () => {
    expect(defaults.server).toEqual({ port: 8000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(defaults.ai.provider).toBe('groq');
    expect(defaults.ai.groq.model).toBe('llama-3.3-70b-versatile');
    expect(defaults.ai.maxTokens).toBe(256);
    expect(defaults.rag).toEqual({
      enabled: true,
      topK: 8,
      globalContactId: 'global',
      embedding: {
        baseUrl: 'http://localhost:11434/v1',
        apiKey: '',
        model: 'all-minilm',
        dimensions: 384,
      },
    });
    expect(defaults.history.limit).toBe(10);
    expect(defaults.rateLimit).toEqual({ maxRequests: 120, windowMs: 3600000 });
  });

  it('should resolve data files relative to the server directory', () => {
    expect(defaults.persona.personasDir).toBe(path.join(SERVER_ROOT, 'personas'));
    expect(defaults.filters.noisePatternsFile).toBe(
      path.join(SERVER_ROOT, 'data', 'noise-patterns.json')
    );
  });

  it('should read values from the environment', () => {
    const cfg = buildConfig({
      PORT: '9100',
      AI_PROVIDER: 'ollama',
      AI_TEMPERATURE: '0.2',
      DISABLE_RAG: 'true',
      RAG_TOP_K: '4',
      HISTORY_LIMIT: '6',
    });
    expect(cfg.server.port).toBe(9100);
    expect(cfg.ai.provider).toBe('ollama');
    expect(cfg.ai.temperature).toBe(0.2);
    expect(cfg.rag.enabled).toBe(false);
    expect(cfg.rag.topK).toBe(4);
    expect(cfg.history.limit).toBe(6);
  });

  it('should ignore invalid numbers and unknown providers', () => {
    const cfg = buildConfig({ PORT: 'abc', AI_PROVIDER: 'mystery', DISABLE_RAG: 'no' });
    expect(cfg.server.port).toBe(8000);
    expect(cfg.ai.provider).toBe('groq');
    expect(cfg.rag.enabled).toBe(true);
  });

  it('should export a config built from process.env', () => {
    expect(config.server.port).toBeGreaterThan(0);
  });
});

describe('validateConfig', () => {
  it('should list every missing variable', () => {
    const cfg = buildConfig({});
    expect(findMissingSettings(cfg)).toEqual(['GROQ_API_KEY', 'DATABASE_URL']);
    expect(() => validateConfig(cfg)).toThrow(
      'Missing required configuration: GROQ_API_KEY, DATABASE_URL'
    );
  });

  it('should not require a Groq key for Ollama', () => {
    const cfg = buildConfig({ AI_PROVIDER: 'ollama', DATABASE_URL: 'postgres://localhost/test' });
    expect(() => validateConfig(cfg)).not.toThrow();
  });

  it('should carry the missing names on the error', () => {
    try {
      validateConfig(buildConfig({ GROQ_API_KEY: 'test-secret' }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('missing', ['DATABASE_URL']);
    }
  });
});
