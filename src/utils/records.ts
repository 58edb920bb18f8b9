export type JsonRecord = Record<string, unknown>;
export type Identifier = string | number | null;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Sub-objeto ausente ou malformado vira `{}` para que a leitura dos campos nunca falhe. */
export function recordOrEmpty(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function stringOrNull(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function identifierOrNull(value: unknown): Identifier {
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return value;
  }
  return null;
}

/** Primeiro valor "truthy", como o `a or b` das respostas de provedor. */
export function firstPresent(...values: unknown[]): unknown {
  return values.find(value => Boolean(value));
}

export function truncate(message: string, maxLength = 200): string {
  return message.length > maxLength ? message.slice(0, maxLength) : message;
}
