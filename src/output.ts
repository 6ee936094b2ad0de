export type CliOk = {
  ok: true;
  command: string;
  data: Record<string, unknown>;
};

export type CliErr = {
  ok: false;
  command: string;
  error: { message: string; code?: string; exit_code?: number };
};

export function okJson(command: string, data: Record<string, unknown> = {}): CliOk {
  return { ok: true, command, data };
}

export function errJson(command: string, message: string, opts: { code?: string; exitCode?: number } = {}): CliErr {
  const error: CliErr["error"] = { message };
  if (opts.code !== undefined) error.code = opts.code;
  if (opts.exitCode !== undefined) error.exit_code = opts.exitCode;
  return { ok: false, command, error };
}

export type Write = (chunk: string) => void;

export const stdoutWrite: Write = (chunk) => {
  process.stdout.write(chunk);
};

export const stderrWrite: Write = (chunk) => {
  process.stderr.write(chunk);
};

export function printJson(payload: CliOk | CliErr, write: Write = stdoutWrite): void {
  write(`${JSON.stringify(payload)}\n`);
}
