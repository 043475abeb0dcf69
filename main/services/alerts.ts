import { logError, logInfo, logWarn } from "../utils/logger.js";
import type { ConflictResolution } from "./events.js";

export type AlertStyle = "informational" | "warning" | "critical";

export interface Alert {
  style: AlertStyle;
  message: string;
  informativeText?: string;
}

/** User-facing channel for problems with the config file or an action. */
export interface AlertHandler {
  showAlert(alert: Alert): void;
}

export interface ConflictPrompt {
  /**
   * Asked when the config file changed on disk since it was last read and a
   * save is about to replace it.
   */
  askOverwriteCancelReload(details: { path: string }): Promise<ConflictResolution>;
}

export const CONFLICT_MESSAGE = "Configuration file changed on disk";
export const CONFLICT_INFORMATIVE_TEXT =
  "The config file was modified outside the app since it was last read. " +
  "Overwrite it with the current settings, cancel the save, or read the file again?";

/** Writes alerts to the log. */
export class LoggingAlertHandler implements AlertHandler {
  showAlert(alert: Alert): void {
    const context = alert.informativeText ? { detail: alert.informativeText } : undefined;
    switch (alert.style) {
      case "critical":
        logError(alert.message, undefined, context);
        break;
      case "warning":
        logWarn(alert.message, context);
        break;
      default:
        logInfo(alert.message, context);
    }
  }
}

/** Non-interactive prompt that keeps the file on disk untouched. */
export class CancelConflictPrompt implements ConflictPrompt {
  async askOverwriteCancelReload(details: { path: string }): Promise<ConflictResolution> {
    logWarn(`${CONFLICT_MESSAGE}; save cancelled`, { path: details.path });
    return "cancel";
  }
}
