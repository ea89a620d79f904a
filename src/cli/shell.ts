/**
 * Shell for string-form `run` commands. `TASKRUNNER_SHELL` names a shell
 * binary; unset or blank means the platform default (`/bin/sh`, `cmd.exe`).
 */
export function resolveShell(): true | string {
  const raw = process.env.TASKRUNNER_SHELL;
  if (!raw || !raw.trim()) return true;
  return raw.trim();
}
