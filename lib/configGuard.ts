export class ConfigError extends Error {
  readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.variables = variables;
  }
}

export function requireValue(value: string | undefined, name: string, scope: string): string {
  if (!value || value.trim() === "") {
    throw new ConfigError(`${scope}: ${name} must be set in .env`, [name]);
  }
  return value;
}
