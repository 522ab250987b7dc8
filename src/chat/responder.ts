import type { ContextAnalysis, StoredMessage } from '../context/types.js'
import { buildSupportMessages } from '../llm/prompts/supportPrompt.js'
import type { ProviderChain } from '../llm/providerChain.js'

export interface ResponseRequest {
  userId: string
  text: string
  analysis: ContextAnalysis
  history: readonly StoredMessage[]
}

/** Produces supportive free text for one user turn. Treated as opaque by the chat service. */
export type ResponseGenerator = (request: ResponseRequest) => Promise<string>

export const MIN_REPLY_LENGTH = 10

export const SHORT_REPLY_FALLBACK =
  "I understand what you're saying. Could you tell me more about how you're feeling?"

export const UNAVAILABLE_FALLBACK =
  "I'm here to listen and support you. I'm experiencing some technical difficulties right now, " +
  'but I want you to know that your feelings are valid and important. Would you like to try sharing again?'

export function createLlmResponder(chain: ProviderChain): ResponseGenerator {
  return async request => {
    const result = await chain.generate(buildSupportMessages(request), { maxTokens: 800, temperature: 0.7 })
    if (result.provider === 'none') return UNAVAILABLE_FALLBACK

    const text = result.text.trim()
    if (text.length < MIN_REPLY_LENGTH) {
      console.warn(`[chat] ${result.provider} reply too short (${text.length} chars), using follow-up question`)
      return SHORT_REPLY_FALLBACK
    }
    return text
  }
}
