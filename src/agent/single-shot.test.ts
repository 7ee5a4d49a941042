// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { runSingleShot } from './single-shot.js';
import { buildSingleShotPrompt } from './prompt.js';
import type { ChatRequest, ChatResponse, GenerateRequest, ModelProvider } from '../model/types.js';

describe('runSingleShot', () => {
  it('asks the generate endpoint once and returns its text', async () => {
    const requests: Array<GenerateRequest> = [];
    const model: ModelProvider = {
      async chat(_request: ChatRequest): Promise<ChatResponse> {
        throw new Error('chat is not used in single-shot mode');
      },
      async generate(request: GenerateRequest): Promise<string> {
        requests.push(request);
        return 'brew install redis';
      },
    };

    const output = await runSingleShot({ userRequest: 'install redis', modelName: 'llama3.2' }, model);

    expect(output).toBe('brew install redis');
    expect(requests).toEqual([{ model: 'llama3.2', prompt: buildSingleShotPrompt('install redis') }]);
  });
});
