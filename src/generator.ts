import type { GenerationClient } from './engines/llm-client.js';
import { buildPrompt, resolveStyle } from './engines/shared.js';

export interface CommitRequest {
  description: string;
  style: string;
}

export async function generateCommitMessage(
  client: GenerationClient,
  request: CommitRequest
): Promise<string> {
  const prompt = buildPrompt(request.description, resolveStyle(request.style));
  return client.generate(prompt);
}
