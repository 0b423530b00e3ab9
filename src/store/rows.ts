import { isRecord, tryParseJson } from "../utils/json.js";

export function toBool(value: number): boolean {
  return value === 1;
}

export function toOptionalBool(value: number | null): boolean | null {
  return value === null ? null : value === 1;
}

export function fromBool(value: boolean | undefined): number {
  return value ? 1 : 0;
}

export function parseStringList(text: string): string[] {
  const parsed = tryParseJson(text);
  if (!parsed.ok || !Array.isArray(parsed.value)) return [];
  return parsed.value.filter((v): v is string => typeof v === "string");
}

export function parseObject(text: string): Record<string, unknown> {
  const parsed = tryParseJson(text);
  return parsed.ok && isRecord(parsed.value) ? parsed.value : {};
}
