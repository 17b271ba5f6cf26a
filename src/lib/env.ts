/** Read an environment variable; `undefined` when unset or outside Node. */
export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== 'undefined' && process.env[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};
