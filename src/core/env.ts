// Environment lookups degrade to defaults where `process` is absent (browser bundles).
const readEnv = (name: string): string | undefined => {
  if (typeof process === 'undefined' || !process.env) return undefined;
  return process.env[name];
};

export const envFlag = (name: string): boolean => readEnv(name) === '1';

