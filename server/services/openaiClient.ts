import { OpenAI } from "openai";
import { getEnv, type AppEnv } from "../config/env";

let cachedClient: OpenAI | null = null;

export const createModelClient = (env: AppEnv): OpenAI => {
  if (env.MODEL_PROVIDER === "openai") {
    if (!env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is not configured");
    }
    return new OpenAI({ apiKey: env.OPENAI_API_KEY, maxRetries: 0 });
  }

  if (!env.OPENROUTER_API_KEY) {
    throw new Error("OPENROUTER_API_KEY is not configured");
  }
  // Retries and timeouts are applied by the pipeline's retry policy.
  return new OpenAI({
    apiKey: env.OPENROUTER_API_KEY,
    baseURL: env.OPENROUTER_BASE_URL,
    maxRetries: 0,
  });
};

export const getModelClient = (): OpenAI => {
  if (!cachedClient) {
    cachedClient = createModelClient(getEnv());
  }
  return cachedClient;
};
