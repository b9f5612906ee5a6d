export function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}
