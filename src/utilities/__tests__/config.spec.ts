import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      isDev: false,
      port: 8000,
      chunkSize: 1000,
      chunkOverlap: 200,
      defaultResultCount: 5,
      maxFileSizeBytes: 50 * 1024 * 1024,
      embeddingModel: 'all-minilm',
      ollama: { baseUrl: 'http://localhost:11434', defaultModel: 'llama2', timeoutMs: 90000 },
    });
  });

  it('reads overrides and trims the base url', () => {
    const config = loadConfig({
      NODE_ENV: 'DEV',
      PORT: '9000',
      OLLAMA_BASE_URL: 'http://ollama:11434/',
      OLLAMA_MODEL: 'mistral',
    });
    expect(config.isDev).toBe(true);
    expect(config.port).toBe(9000);
    expect(config.ollama.baseUrl).toBe('http://ollama:11434');
    expect(config.ollama.defaultModel).toBe('mistral');
  });

  it('rejects a non-numeric number setting', () => {
    expect(() => loadConfig({ CHUNK_SIZE: 'large' })).toThrow('CHUNK_SIZE must be a positive number.');
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP must be smaller than CHUNK_SIZE.'
    );
  });

  it('accepts a zero chunk overlap', () => {
    expect(loadConfig({ CHUNK_OVERLAP: '0' }).chunkOverlap).toBe(0);
  });

  it('rejects a negative chunk overlap', () => {
    expect(() => loadConfig({ CHUNK_OVERLAP: '-1' })).toThrow('CHUNK_OVERLAP must be a non-negative number.');
  });

  it('still rejects zero for positive settings', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '0' })).toThrow('CHUNK_SIZE must be a positive number.');
  });
});
