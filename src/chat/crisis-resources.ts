/**
 * Static crisis resources, appended to any reply whose message was flagged as
 * a crisis. The engine only raises the flag; wording lives here.
 */
export const CRISIS_RESOURCES: readonly string[] = Object.freeze([
  'National Suicide & Crisis Lifeline (US): call or text 988, available 24/7',
  'Crisis Text Line: text HOME to 741741',
  'If you are in immediate danger, call your local emergency number',
])

export function crisisNotice(): string {
  return [
    "⚠️ If you're having thoughts of harming yourself, please reach out right now. You're not alone, and help is available:",
    ...CRISIS_RESOURCES.map(line => `- ${line}`),
  ].join('\n')
}
