import OpenAI from 'openai';
import { requireApiKey, type RuntimeEnv } from '../config/env.js';
import type { ChatMessage, ChatOptions } from './types.js';

/**
 * One-shot streamed answer through the OpenAI SDK, outside any panel.
 * SDK retries are off: one attempt per request, as for panel sessions.
 */
export async function* streamAnswer(
  messages: ChatMessage[],
  model: string,
  env: RuntimeEnv,
  options: ChatOptions = { temperature: 0.7, maxTokens: 2048 },
): AsyncGenerator<string> {
  const client = new OpenAI({
    apiKey: requireApiKey(env),
    baseURL: env.OPENAI_BASE_URL,
    maxRetries: 0,
  });

  const stream = await client.chat.completions.create({
    model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    temperature: options.temperature,
    max_tokens: options.maxTokens,
    stream: true,
  });

  for await (const chunk of stream) {
    const delta = chunk.choices[0]?.delta?.content;
    if (delta) yield delta;
  }
}
