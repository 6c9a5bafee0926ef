import { AppKeySchema, type AppKey } from "arr-rotator-commons";
import z from "zod";

const AppList = z.array(z.string().trim().toLowerCase().pipe(AppKeySchema));

export type TriggerArgs = { apps?: AppKey[]; requestedBy: string };

/** `arr-run-trigger [--by <name>] [app...]`; no apps means all of them. */
export function parseTriggerArgs(argv: readonly string[], defaultRequester = "cli"): TriggerArgs {
  const rest: string[] = [];
  let requestedBy = defaultRequester;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--by") {
      const value = argv[++i];
      if (!value) throw new Error("--by needs a value");
      requestedBy = value;
      continue;
    }
    rest.push(arg);
  }

  const parsed = AppList.safeParse(rest);
  if (!parsed.success) {
    throw new Error(`Unknown app in ${JSON.stringify(rest)}; expected any of ${AppKeySchema.options.join(", ")}`);
  }
  const apps = [...new Set(parsed.data)];
  return apps.length ? { apps, requestedBy } : { requestedBy };
}
