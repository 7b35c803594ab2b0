export function isObjectObject(val: unknown): val is Record<string, unknown> {
  return val != null && typeof val === "object" && Array.isArray(val) === false;
}

export function isEmptyObject(value: unknown): boolean {
  return isObjectObject(value) && Object.keys(value).length === 0;
}
