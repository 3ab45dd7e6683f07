export type EnvVarOverride = {
  name: string;
  value: string;
  description: string;
};

const ENV_VARS_TO_DISPLAY: Array<{ name: string; description: string }> = [
  { name: 'LLM_COST_REGISTRY_DIR', description: 'pricing registry directory' },
  { name: 'LLM_COST_MAX_BATCH_SIZE', description: 'max items per batch' },
];

export function getActiveEnvVarOverrides(env: NodeJS.ProcessEnv = process.env): EnvVarOverride[] {
  return ENV_VARS_TO_DISPLAY.flatMap(({ name, description }) => {
    const value = env[name];
    return value !== undefined && value !== '' ? [{ name, value, description }] : [];
  });
}

export function formatEnvVarOverrides(overrides: EnvVarOverride[]): string[] {
  if (overrides.length === 0) {
    return [];
  }

  return [
    'Active environment overrides:',
    ...overrides.map(({ name, value, description }) => `  ${name}=${value}  (${description})`),
  ];
}
