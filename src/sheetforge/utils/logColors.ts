// utils/logColors.ts

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",

  // headers / sections
  section: "\x1b[36m", // cyan

  // actions (meaning)
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  processing: "\x1b[35m",

  // subjects (data)
  subject: "\x1b[90m", // light gray (NOT white)
};

/**
log semantic
 [SUBJECT]:
  [Action]: [subject  ]
*/

export type LogLevel = "success" | "warn" | "error" | "processing";

export interface Logger {
  section(title: string): void;
  action(level: LogLevel, action: string, subject: string): void;
}

export function createLogger(silent = false): Logger {
  return {
    section(title) {
      if (silent) return;
      console.log(`${colors.section}${colors.bold}${title}:${colors.reset}`);
    },

    action(level, action, subject) {
      if (silent) return;
      const line = `  ${colors[level]}${action}:${colors.reset} ${colors.subject}${subject}${colors.reset}`;

      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
    },
  };
}
