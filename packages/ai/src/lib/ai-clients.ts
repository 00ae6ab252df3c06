import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";

export interface AiClientOptions {
  apiKey?: string;
  baseURL?: string;
}

// Keys not passed in are read from the environment
export const createOpenAIClient = (options: AiClientOptions = {}) =>
  createOpenAI({
    baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
    apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
  });

export const createGeminiClient = (options: AiClientOptions = {}) =>
  createGoogleGenerativeAI({
    baseURL: options.baseURL,
    apiKey: options.apiKey ?? process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  });
