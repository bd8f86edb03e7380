import { execFile } from 'node:child_process';
import { silentLogger, type Logger } from './log.js';

export interface Notifier {
  /** Fire-and-forget; never throws. */
  notify(title: string, message: string): void;
}

export const nullNotifier: Notifier = {
  notify: () => {},
};

/** Quote a value as an AppleScript string literal. */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function notificationScript(title: string, message: string): string {
  return `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`;
}

export type ExecFileLike = (file: string, args: string[], callback: (error: Error | null) => void) => void;

const execFileQuiet: ExecFileLike = (file, args, callback) => {
  execFile(file, args, (error) => callback(error));
};

/** macOS Notification Center via `osascript`. */
export function createOsascriptNotifier(logger: Logger = silentLogger, run: ExecFileLike = execFileQuiet): Notifier {
  return {
    notify(title, message) {
      run('osascript', ['-e', notificationScript(title, message)], (error) => {
        if (error) logger.debug(`desktop notification failed: ${error.message}`);
      });
    },
  };
}

export function createNotifier(
  enabled: boolean,
  logger: Logger = silentLogger,
  platform: NodeJS.Platform = process.platform,
): Notifier {
  if (!enabled) return nullNotifier;
  if (platform !== 'darwin') {
    logger.debug(`desktop notifications are only supported on macOS (platform=${platform})`);
    return nullNotifier;
  }
  return createOsascriptNotifier(logger);
}
