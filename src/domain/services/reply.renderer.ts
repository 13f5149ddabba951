import type { ProviderError } from '../../shared/errors.js';
import type { AiProvider } from '../../shared/types/llm.js';

export const PROVIDER_FAILURE_REPLY =
  "Sorry, I couldn't process that right now. Please try again later.";

export const DELIVERY_FAILURE_REPLY = "Sorry, I couldn't send the response back. Please try again.";

export const providerLabel = (provider: AiProvider): string =>
  provider === 'openai' ? 'OpenAI' : 'Google Gemini';

export function renderWelcome(provider: AiProvider): string {
  return [
    `Hi! I'm an AI chat bot powered by ${providerLabel(provider)}.`,
    '',
    "Just send me any message, and I'll do my best to respond. I can handle short questions or longer discussions.",
    '',
    "Let's chat!",
  ].join('\n');
}

export function renderProviderFailure(error: ProviderError): string {
  if (error.category === 'blocked' && error.blockReason) {
    return `My response was blocked due to: ${error.blockReason}. Please rephrase your request.`;
  }
  return PROVIDER_FAILURE_REPLY;
}
