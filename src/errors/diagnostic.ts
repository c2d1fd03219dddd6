export type Severity = "error" | "warning";

/** A problem with one command-line option, reported before any foreign call. */
export interface Diagnostic {
  severity: Severity;
  message: string;
  option: string;
  value?: string;
  help?: string;
}

export function error(message: string, option: string, value?: string, help?: string): Diagnostic {
  return { severity: "error", message, option, value, help };
}

export function warning(message: string, option: string, value?: string, help?: string): Diagnostic {
  return { severity: "warning", message, option, value, help };
}
