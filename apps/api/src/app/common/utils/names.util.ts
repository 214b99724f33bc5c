export function normalizeEmail(value: string | null | undefined): string {
  return String(value ?? '').trim().toLowerCase();
}

/** Collapses whitespace runs to single spaces and trims both ends. */
export function normalizePersonName(value: string | null | undefined): string {
  return String(value ?? '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

function capitalize(word: string) {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Display name for an identity that carries only an email:
 * `maria.papadopoulou@uni.edu` becomes `Maria Papadopoulou`.
 */
export function displayNameFromEmail(email: string | null | undefined): string {
  const localPart = normalizeEmail(email).split('@')[0] ?? '';
  const words = localPart.split(/[._-]+/).filter(Boolean).map(capitalize);
  return words.length > 0 ? words.join(' ') : 'User';
}
