// Typed reads from a parsed JSON body; validation has already run.

const field = (body: unknown, key: string): unknown =>
  typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;

export const optionalString = (body: unknown, key: string): string | undefined => {
  const value = field(body, key);
  return typeof value === 'string' ? value : undefined;
};

export const optionalNumber = (body: unknown, key: string): number | undefined => {
  const value = field(body, key);
  return typeof value === 'number' ? value : undefined;
};

export const optionalBoolean = (body: unknown, key: string): boolean | undefined => {
  const value = field(body, key);
  return typeof value === 'boolean' ? value : undefined;
};

export const requiredString = (body: unknown, key: string): string => optionalString(body, key) ?? '';
