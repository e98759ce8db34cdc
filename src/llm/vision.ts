import { CHART_SYSTEM } from '@/llm/prompts.ts';
import type { LlmClient } from '@/llm/client.ts';
import type { VisionAnalyzer } from '@/plan/capabilities.ts';

export const createVisionAnalyzer = (llm: LlmClient): VisionAnalyzer => ({
  analyze: (image, instructions, signal) =>
    llm.complete(
      {
        capability: 'vision',
        tier: 'balanced',
        system: CHART_SYSTEM,
        content: [
          {
            type: 'image',
            source: { type: 'base64', media_type: image.mediaType, data: image.data },
          },
          { type: 'text', text: instructions },
        ],
      },
      signal,
    ),
});
