import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, type AppConfig } from './config';
import { createGeminiAdvisor } from './geminiService';

const { listModels, generateContent, clientOptions } = vi.hoisted(() => ({
  listModels: vi.fn(),
  generateContent: vi.fn(),
  clientOptions: vi.fn(),
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { list: listModels, generateContent };
    constructor(options: unknown) {
      clientOptions(options);
    }
  },
}));

interface ListedModel {
  name?: string;
  supportedActions?: string[];
}

const pagerOf = (models: ListedModel[]) => ({
  async *[Symbol.asyncIterator]() {
    yield* models;
  },
});

const config: AppConfig = { apiKey: 'test-key', model: 'gemini-2.5-flash', weatherTimeoutMs: 8000 };

describe('createGeminiAdvisor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    listModels.mockReset();
    generateContent.mockReset();
    clientOptions.mockReset();
    vi.restoreAllMocks();
  });

  it('creates the client with the configured key', async () => {
    listModels.mockResolvedValue(pagerOf([{ name: 'models/gemini-2.5-flash', supportedActions: ['generateContent'] }]));

    await createGeminiAdvisor(config);

    expect(clientOptions).toHaveBeenCalledWith({ apiKey: 'test-key' });
  });

  it('uses the configured model when the key can call it', async () => {
    listModels.mockResolvedValue(
      pagerOf([
        { name: 'models/gemini-pro', supportedActions: ['generateContent'] },
        { name: 'models/gemini-2.5-flash', supportedActions: ['countTokens', 'generateContent'] },
      ])
    );

    const advisor = await createGeminiAdvisor(config);

    expect(advisor.modelName).toBe('models/gemini-2.5-flash');
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('falls back to the first model that supports generateContent', async () => {
    listModels.mockResolvedValue(
      pagerOf([
        { name: 'models/embedding-001', supportedActions: ['embedContent'] },
        { supportedActions: ['generateContent'] },
        { name: 'models/gemini-2.5-flash' },
        { name: 'models/gemini-pro', supportedActions: ['generateContent'] },
        { name: 'models/gemini-1.5-flash', supportedActions: ['generateContent'] },
      ])
    );

    const advisor = await createGeminiAdvisor(config);

    expect(advisor.modelName).toBe('models/gemini-pro');
    expect(console.warn).toHaveBeenCalledWith('Model gemini-2.5-flash is not available for this key, using models/gemini-pro.');
  });

  it('fails when no listed model supports generateContent', async () => {
    listModels.mockResolvedValue(pagerOf([{ name: 'models/embedding-001', supportedActions: ['embedContent'] }]));

    const advisor = createGeminiAdvisor(config);

    await expect(advisor).rejects.toThrow(ConfigurationError);
    await expect(advisor).rejects.toThrow(
      'No Gemini model with generateContent found for your API key. Check Google AI Studio.'
    );
  });

  it('wraps a model listing failure', async () => {
    listModels.mockRejectedValue(new Error('API key not valid'));

    const advisor = createGeminiAdvisor(config);

    await expect(advisor).rejects.toThrow(ConfigurationError);
    await expect(advisor).rejects.toThrow('Could not load Gemini models: API key not valid');
    expect(console.error).toHaveBeenCalledWith('Gemini Model Listing Error:', expect.any(Error));
  });

  describe('generate', () => {
    beforeEach(() => {
      listModels.mockResolvedValue(pagerOf([{ name: 'models/gemini-2.5-flash', supportedActions: ['generateContent'] }]));
    });

    it('sends the prompt to the resolved model and returns the text', async () => {
      generateContent.mockResolvedValue({ text: 'Plant sorghum.' });
      const advisor = await createGeminiAdvisor(config);

      await expect(advisor.generate('What should I plant?')).resolves.toBe('Plant sorghum.');
      expect(generateContent).toHaveBeenCalledWith({
        model: 'models/gemini-2.5-flash',
        contents: 'What should I plant?',
      });
    });

    it('returns an empty string when the response has no text', async () => {
      generateContent.mockResolvedValue({ text: undefined });
      const advisor = await createGeminiAdvisor(config);

      await expect(advisor.generate('prompt')).resolves.toBe('');
    });

    it('lets generation errors through to the caller', async () => {
      generateContent.mockRejectedValue(new Error('quota exceeded'));
      const advisor = await createGeminiAdvisor(config);

      await expect(advisor.generate('prompt')).rejects.toThrow('quota exceeded');
    });
  });
});
