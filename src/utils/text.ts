export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

export function presence(value: string | null | undefined): string | null {
  return isBlank(value) ? null : (value ?? null);
}

export function truncate(text: string, max: number, omission = "..."): string {
  if (text.length <= max) return text;
  return text.slice(0, Math.max(0, max - omission.length)) + omission;
}

/** Rough token count used for budgeting: four characters per token. */
export function estimateTokens(text: string | null | undefined): number {
  if (!text) return 0;
  return Math.ceil(text.length / 4);
}
