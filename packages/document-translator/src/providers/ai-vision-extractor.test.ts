import { LLMCaller } from '@pagelingo/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PAGE_EXTRACTION_PROMPT } from '../extractors/page-extraction-prompt';
import { AiVisionExtractor } from './ai-vision-extractor';

vi.mock('@pagelingo/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@pagelingo/shared')>()),
  LLMCaller: {
    call: vi.fn(),
    callVision: vi.fn(),
  },
}));

describe('AiVisionExtractor', () => {
  const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  const model = 'google/gemini-2.0-flash';

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(LLMCaller.callVision).mockResolvedValue({
      text: '<p>page</p>',
      usage: {
        component: 'AiVisionExtractor',
        phase: 'extraction',
        model: 'primary',
        modelName: model,
        inputTokens: 900,
        outputTokens: 300,
        totalTokens: 1200,
      },
      usedFallback: false,
    });
  });

  test('should send the instructions and the page image', async () => {
    const image = new Uint8Array([137, 80, 78, 71]);
    const extractor = new AiVisionExtractor(mockLogger, model);

    const text = await extractor.generate(image);

    expect(text).toBe('<p>page</p>');
    expect(LLMCaller.callVision).toHaveBeenCalledWith(
      expect.objectContaining({
        primaryModel: model,
        component: 'AiVisionExtractor',
        phase: 'extraction',
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: PAGE_EXTRACTION_PROMPT },
              { type: 'image', image, mediaType: 'image/png' },
            ],
          },
        ],
      }),
    );
  });

  test('should use the configured image type', async () => {
    const image = new Uint8Array([255, 216]);
    const extractor = new AiVisionExtractor(mockLogger, model, {
      imageMimeType: 'image/jpeg',
    });

    await extractor.generate(image);

    expect(vi.mocked(LLMCaller.callVision).mock.calls[0][0].messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: PAGE_EXTRACTION_PROMPT },
          { type: 'image', image, mediaType: 'image/jpeg' },
        ],
      },
    ]);
  });
});
