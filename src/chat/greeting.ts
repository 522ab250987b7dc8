import type { UserContextSnapshot } from '../context/types.js'

export function greetingFor(snapshot: UserContextSnapshot): string {
  if (snapshot.totalMessages === 0) {
    return "Hello! I'm here to support you. How are you feeling today?"
  }
  if (snapshot.engagementLevel === 'high') {
    return "Welcome back! I'm glad to see you again. How have you been since we last talked?"
  }
  switch (snapshot.sentimentTrend) {
    case 'positive':
    case 'improving':
      return "Hello! It sounds like things have been looking up lately. How are you doing today?"
    case 'negative':
    case 'worsening':
      return "Hi there. I'm here to listen and support you. What's on your mind today?"
    default:
      return "Hello! How are you feeling today? I'm here to listen and support you."
  }
}
