/** Read a boolean flag from the environment ("true" or "1"). */
export function envBool(key: string, defaultVal: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
}
