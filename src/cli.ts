import * as path from "path";
import { renderPayloadHtml } from "@/components/display/renderPayloadHtml";
import { getErrorMessage } from "@/lib/errors";
import { loadLatestPayload } from "@/services/display/loadPayload";
import { useSchedulerStore } from "@/stores/useSchedulerStore";
import type { RunSummary } from "@/types/notecast";

const DEFAULT_CONFIG_FILE = "notecast.config.json";

const USAGE = `Usage: notecast [watch|once] [--config <path>]
       notecast render <webhook-url>

  watch   push on every refresh interval (default); SIGUSR2 refreshes now
  once    run a single refresh and exit
  render  print the latest pushed fields as HTML`;

export type Command =
  | { name: "watch" | "once"; configPath: string }
  | { name: "render"; source: string }
  | { name: "help" };

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): Command {
  const args = [...argv];
  let configPath = env.NOTECAST_CONFIG || DEFAULT_CONFIG_FILE;
  const positional: string[] = [];

  while (args.length > 0) {
    const arg = args.shift();
    if (arg === "--help" || arg === "-h") return { name: "help" };
    if (arg === "--config" || arg === "-c") {
      const value = args.shift();
      if (!value) throw new Error(`${arg} needs a path`);
      configPath = value;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [name = "watch", source] = positional;
  switch (name) {
    case "watch":
    case "once":
      return { name, configPath: path.resolve(configPath) };
    case "render":
      if (!source) throw new Error("render needs a webhook URL");
      return { name, source };
    default:
      throw new Error(`Unknown command: ${name}`);
  }
}

export function summaryFailed(summary: RunSummary | null): boolean {
  if (!summary) return true;
  return summary.configError !== null || summary.results.some((r) => r.outcome === "failed");
}

async function watch(configPath: string): Promise<void> {
  const scheduler = useSchedulerStore.getState();

  process.on("SIGUSR2", () => {
    console.log("[notecast] Manual refresh requested");
    void scheduler.runNow("manual");
  });

  const shutdown = () => {
    scheduler.stop();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await scheduler.start(configPath);
}

export async function runCli(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseArgs(argv);
  } catch (error) {
    console.error(`[notecast] ${getErrorMessage(error)}\n\n${USAGE}`);
    return 2;
  }

  switch (command.name) {
    case "help":
      console.log(USAGE);
      return 0;
    case "watch":
      await watch(command.configPath);
      return 0;
    case "once": {
      useSchedulerStore.setState({ configPath: command.configPath });
      const summary = await useSchedulerStore.getState().runNow("manual");
      return summaryFailed(summary) ? 1 : 0;
    }
    case "render":
      try {
        const fields = await loadLatestPayload(command.source);
        process.stdout.write(`${renderPayloadHtml(fields)}\n`);
        return 0;
      } catch (error) {
        console.error(`[notecast] ${getErrorMessage(error)}`);
        return 1;
      }
  }
}
