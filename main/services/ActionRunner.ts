import { execa } from "execa";
import fs from "fs/promises";
import os from "os";
import path from "path";
import type { ActionNode, GroupNode } from "../../shared/types/config.js";
import { collectActions } from "../../shared/utils/configTree.js";
import { buildShellCommand } from "../../shared/utils/shellEscape.js";
import { logInfo, logWarn } from "../utils/logger.js";
import { LoggingAlertHandler, type AlertHandler } from "./alerts.js";
import { events as defaultEvents, type TypedEventBus } from "./events.js";

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  failed: boolean;
  errorMessage?: string;
}

export type ProcessLauncher = (
  file: string,
  args: string[],
  options?: { cwd?: string }
) => Promise<ProcessResult>;

function outputText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export const execaLauncher: ProcessLauncher = async (file, args, options = {}) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    stdin: "ignore",
    cleanup: true,
    reject: false,
  });
  return {
    exitCode: result.exitCode ?? null,
    stdout: outputText(result.stdout),
    stderr: outputText(result.stderr),
    failed: result.failed,
    errorMessage: result instanceof Error ? result.message : undefined,
  };
};

/** Supplies the values for a script's declared arguments; null cancels the run. */
export interface ArgumentPrompt {
  askForArguments(action: ActionNode): Promise<string[] | null>;
}

/** Uses each argument's default value without asking. */
export class DefaultValueArgumentPrompt implements ArgumentPrompt {
  async askForArguments(action: ActionNode): Promise<string[] | null> {
    return (action.arguments ?? []).map((arg) => arg.defaultValue ?? "");
  }
}

export interface ActionRunnerOptions {
  alerts?: AlertHandler;
  argumentPrompt?: ArgumentPrompt;
  launcher?: ProcessLauncher;
  events?: TypedEventBus;
  platform?: NodeJS.Platform;
  /** Shell used for command actions; defaults to $SHELL, then /bin/sh */
  shell?: string;
  homeDir?: string;
}

export function expandTilde(value: string, homeDir: string = os.homedir()): string {
  if (value === "~") return homeDir;
  if (value.startsWith("~/")) return path.join(homeDir, value.slice(2));
  return value;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    return new URL(value).protocol.length > 1;
  } catch {
    return false;
  }
}

/**
 * Performs the effect of an action: opens applications, URLs, files and
 * folders with the platform opener, and runs commands and scripts through the
 * user's shell. Problems are reported through the alert handler.
 */
export class ActionRunner {
  private readonly alerts: AlertHandler;
  private readonly argumentPrompt: ArgumentPrompt;
  private readonly launcher: ProcessLauncher;
  private readonly events: TypedEventBus;
  private readonly platform: NodeJS.Platform;
  private readonly shell: string;
  private readonly homeDir: string;

  constructor(options: ActionRunnerOptions = {}) {
    this.alerts = options.alerts ?? new LoggingAlertHandler();
    this.argumentPrompt = options.argumentPrompt ?? new DefaultValueArgumentPrompt();
    this.launcher = options.launcher ?? execaLauncher;
    this.events = options.events ?? defaultEvents;
    this.platform = options.platform ?? process.platform;
    this.shell = options.shell ?? (process.env.SHELL || "/bin/sh");
    this.homeDir = options.homeDir ?? os.homedir();
  }

  async runAction(action: ActionNode): Promise<void> {
    logInfo("Running action", { type: action.type, key: action.key, value: action.value });
    this.events.emit("action:dispatched", {
      uiid: action.uiid,
      type: action.type,
      value: action.value,
    });

    switch (action.type) {
      case "application":
        await this.openApplication(action.value);
        return;
      case "url":
        await this.openUrl(action);
        return;
      case "command":
        await this.runCommand(action.value);
        return;
      case "folder":
      case "file":
        await this.open(expandTilde(action.value, this.homeDir), action.openWith);
        return;
      case "script":
        await this.runScript(action);
        return;
    }
  }

  /** Runs every action below `group` in depth-first order, one after another. */
  async runGroupRecursively(group: GroupNode): Promise<void> {
    for (const action of collectActions(group)) {
      await this.runAction(action);
    }
  }

  private openerCommand(target: string, openWith?: string): [string, string[]] {
    switch (this.platform) {
      case "darwin":
        return openWith ? ["open", ["-a", openWith, target]] : ["open", [target]];
      case "win32":
        return openWith ? [openWith, [target]] : ["cmd", ["/c", "start", "", target]];
      default:
        return openWith ? [openWith, [target]] : ["xdg-open", [target]];
    }
  }

  private async openApplication(appPath: string): Promise<void> {
    const target = expandTilde(appPath, this.homeDir);
    if (this.platform === "darwin") {
      await this.launch("open", ["-a", target], `Failed to open ${target}`);
      return;
    }
    await this.open(target);
  }

  private async openUrl(action: ActionNode): Promise<void> {
    if (!isAbsoluteUrl(action.value)) {
      logWarn("Refusing to open invalid URL", { value: action.value });
      this.alerts.showAlert({
        style: "warning",
        message: "Invalid URL",
        informativeText: `"${action.value}" is not a URL with a scheme.`,
      });
      return;
    }
    await this.open(action.value, action.openWith);
  }

  private async open(target: string, openWith?: string): Promise<void> {
    const [file, args] = this.openerCommand(target, openWith);
    await this.launch(file, args, `Failed to open ${target}`);
  }

  private async launch(file: string, args: string[], failureMessage: string): Promise<void> {
    const result = await this.launcher(file, args);
    if (!result.failed && result.exitCode === 0) return;

    this.alerts.showAlert({
      style: "warning",
      message: failureMessage,
      informativeText: result.stderr || result.errorMessage || `${file} exited with ${result.exitCode}`,
    });
  }

  private shellInvocation(command: string): [string, string[]] {
    if (this.platform === "win32") {
      return ["cmd", ["/d", "/s", "/c", command]];
    }
    return [this.shell, ["-c", command]];
  }

  async runCommand(command: string): Promise<ProcessResult> {
    const [file, args] = this.shellInvocation(command);
    const result = await this.launcher(file, args, { cwd: this.homeDir });

    if (result.failed || result.exitCode !== 0) {
      const detail = [result.stderr, result.stdout].filter(Boolean).join("\n");
      this.alerts.showAlert({
        style: "critical",
        message:
          result.exitCode === null
            ? `Command could not be started: ${command}`
            : `Command failed with exit code ${result.exitCode}`,
        informativeText: detail || result.errorMessage || command,
      });
    }
    return result;
  }

  private async runScript(action: ActionNode): Promise<void> {
    const scriptPath = expandTilde(action.value, this.homeDir);
    try {
      await fs.access(scriptPath);
    } catch {
      this.alerts.showAlert({
        style: "critical",
        message: "Script not found",
        informativeText: scriptPath,
      });
      return;
    }

    const values = await this.argumentPrompt.askForArguments(action);
    if (values === null) {
      logInfo("Script run cancelled", { scriptPath });
      return;
    }

    const flavor = this.platform === "win32" ? "windows" : "posix";
    await this.runCommand(buildShellCommand(scriptPath, values, flavor));
  }
}
