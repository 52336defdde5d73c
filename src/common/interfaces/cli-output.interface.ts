export const CLI_OUTPUT = Symbol('CLI_OUTPUT');

/** Where command results and the process exit code go. Swapped for a recorder in tests. */
export interface CliOutput {
  write(text: string): void;
  error(text: string): void;
  setExitCode(code: ExitCode): void;
}

export enum ExitCode {
  SUCCESS = 0,
  NOT_FOUND = 1,
  USAGE = 2,
}
