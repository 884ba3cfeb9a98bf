/** Drop the `--` separator some script runners put before forwarded args */
export function normalizeArgv(rawArgv: string[]): string[] {
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}
