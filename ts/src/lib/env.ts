export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== "" ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

export function positiveIntOrDefault(envVarName: string, defaultValue: number): number {
  const raw = varOrUndefined(envVarName);
  if (raw === undefined) return defaultValue;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${envVarName} must be a positive integer, got "${raw}"`);
  }
  return value;
}
