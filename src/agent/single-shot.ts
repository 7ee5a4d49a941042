// pattern: Imperative Shell

import type { ModelProvider } from '../model/types.js';
import { buildSingleShotPrompt } from './prompt.js';

export type SingleShotOptions = {
  readonly userRequest: string;
  readonly modelName: string;
};

/**
 * Ask the model once, without tools, through the generate endpoint.
 */
export async function runSingleShot(options: SingleShotOptions, model: ModelProvider): Promise<string> {
  return model.generate({
    model: options.modelName,
    prompt: buildSingleShotPrompt(options.userRequest),
  });
}
