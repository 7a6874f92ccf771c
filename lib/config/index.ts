/* eslint-disable no-restricted-properties */
export type EnvReader = (name: string) => string | undefined;

// Blank values count as unset.
export const cfg = {
  raw(name: string): string | undefined {
    const value = process.env[name];
    return value && value.trim() ? value.trim() : undefined;
  },
};
