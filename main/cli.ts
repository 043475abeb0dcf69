import {
  NavigationService,
  type DispatchSink,
  type KeyOutcome,
} from "./services/NavigationService.js";
import { UserConfigService } from "./services/UserConfigService.js";
import { ActionRunner } from "./services/ActionRunner.js";
import { ConfigFile } from "./services/persistence/ConfigFile.js";
import { displayName, pathKey } from "../shared/utils/configTree.js";
import { isSpecialKey } from "../shared/utils/keyMaps.js";
import {
  getPreferencesStore,
  readNavigationSettings,
  type PreferencesStore,
} from "./store.js";
import { setVerboseLogging } from "./utils/logger.js";

export interface CliDependencies {
  preferences?: PreferencesStore;
  sink?: DispatchSink;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

const USAGE = [
  "Usage: leader-tree <command> [keys...]",
  "",
  "Commands:",
  "  path               Print the config file location",
  "  validate           Check the config file and list problems",
  "  preview <keys...>  Show what a key sequence leads to",
  "  run <keys...>      Run the action a key sequence leads to",
  "",
  "Options:",
  "  --verbose          Echo log output to the console",
].join("\n");

/** "os" becomes ["o", "s"]; special key names such as "enter" stay whole. */
export function splitKeys(args: readonly string[]): string[] {
  return args.flatMap((arg) => (isSpecialKey(arg) ? [arg] : Array.from(arg)));
}

export function describeOutcome(outcome: KeyOutcome): string {
  switch (outcome.kind) {
    case "descend":
      return `group ${outcome.group.key ?? ""} (${displayName(outcome.group)})`;
    case "preview":
      return `${outcome.action.type} ${outcome.action.key ?? ""}: ${outcome.action.value}`;
    case "run-action":
      return `ran ${outcome.action.type} ${outcome.action.key ?? ""}: ${outcome.action.value}`;
    case "run-group":
      return `ran group ${outcome.group.key ?? ""} (${displayName(outcome.group)})`;
    case "not-found":
      return `no item for key "${outcome.key}"`;
  }
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  const flags = new Set(argv.filter((token) => token.startsWith("--")));
  const positional = argv.filter((token) => !token.startsWith("--"));
  const [command, ...rest] = positional;

  const preferences = deps.preferences ?? getPreferencesStore();
  if (flags.has("--verbose") || preferences.get("verboseLogging")) {
    setVerboseLogging(true);
  }

  if (!command || flags.has("--help")) {
    stdout(USAGE);
    return flags.has("--help") ? 0 : 1;
  }

  const config = new UserConfigService({ preferences });

  switch (command) {
    case "path":
      stdout(config.configPath);
      return 0;

    case "validate": {
      if (!(await new ConfigFile().exists(config.configPath))) {
        stderr(`Config file not found: ${config.configPath}`);
        return 1;
      }
      await config.load();
      const state = config.getState();
      if (state.loadError) {
        stderr(`${config.configPath}: ${state.loadError}`);
        return 1;
      }
      for (const error of state.validationErrors) {
        stdout(`${pathKey(error.path) || "/"}: ${error.message}`);
      }
      if (state.validationErrors.length > 0) return 1;
      stdout("No problems found");
      return 0;
    }

    case "preview":
    case "run": {
      const keys = splitKeys(rest);
      if (keys.length === 0) {
        stderr(`${command} needs at least one key`);
        return 1;
      }
      await config.ensureAndLoad();
      const navigation = new NavigationService({
        config,
        sink: deps.sink ?? new ActionRunner(),
        getSettings: () => readNavigationSettings(preferences),
      });
      const outcomes = navigation.navigateSequence(keys, { execute: command === "run" });
      navigation.dispose();
      outcomes.forEach((outcome) => stdout(describeOutcome(outcome)));
      return outcomes.some((outcome) => outcome.kind === "not-found") ? 1 : 0;
    }

    default:
      stderr(`Unknown command: ${command}`);
      stderr(USAGE);
      return 1;
  }
}
