import type { ClientOptions, FetchImpl, GenerationClient } from "./llm-client.js";
import type { JsonValue } from "./response.js";
import { extractText } from "./response.js";
import { ServiceError, TransportError } from "../errors.js";

export const GEMINI_MODEL = "gemini-2.5-flash";
export const GEMINI_ENDPOINT = `https://generativelanguage.googleapis.com/v1beta/models/${GEMINI_MODEL}:generateContent`;

const TEMPERATURE = 0.0;
const MAX_OUTPUT_TOKENS = 4096;

export function buildRequestBody(prompt: string): JsonValue {
  return {
    contents: [{ parts: [{ text: prompt }] }],
    generationConfig: {
      temperature: TEMPERATURE,
      maxOutputTokens: MAX_OUTPUT_TOKENS,
    },
  };
}

export class GeminiClient implements GenerationClient {
  private readonly apiKey: string;

  private readonly endpoint: string;

  private readonly fetchImpl: FetchImpl;

  constructor(apiKey: string, options: ClientOptions = {}) {
    this.apiKey = apiKey;
    this.endpoint = GEMINI_ENDPOINT;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
  }

  async generate(prompt: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.apiKey,
        },
        body: JSON.stringify(buildRequestBody(prompt)),
      });
    } catch (error) {
      throw new TransportError(error);
    }

    const body = await readBody(response);

    // Error bodies are kept verbatim, never decoded as a success payload
    if (!response.ok) {
      throw new ServiceError(response.status, body);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new TransportError(error);
    }

    return extractText(data);
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError(error);
  }
}
