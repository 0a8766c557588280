/** One JSON object per line: `{ ts, msg, ...fields }` */
export type LogFields = Record<string, string | number | boolean | null | undefined>;

export function log(msg: string, fields: LogFields = {}): void {
  const ts = new Date().toISOString();
  console.log(JSON.stringify({ ts, msg, ...fields }));
}
