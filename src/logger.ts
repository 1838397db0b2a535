export function log(message: string): void {
  const ts = new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  console.log(`[${ts}] ${message}`);
}

/** Virtual timestamp as printed in log lines, e.g. `t=17.0s` */
export function at(time: number): string {
  return `t=${time.toFixed(1)}s`;
}
