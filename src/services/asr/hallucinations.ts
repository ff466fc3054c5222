const KNOWN_PHRASES = new Set(['you', 'Thank you.', 'Thanks for watching!', 'Bye.', '...']);

/**
 * Whisper fills silence and noise with stock phrases or bracketed sound
 * annotations such as "[Music]" or "(upbeat)".
 */
export const isLikelyHallucination = (text: string): boolean => {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    return true;
  }

  if (trimmed.startsWith('(') && trimmed.endsWith(')')) {
    return true;
  }

  return KNOWN_PHRASES.has(trimmed);
};
