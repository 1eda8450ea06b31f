import { env, stdin, stdout, stderr, exit } from "node:process";
import { buildReport, EnvSchema, formatIssues, toParseOptions } from "./report";

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    if (typeof chunk === "string") {
      chunks.push(Buffer.from(chunk));
    } else {
      chunks.push(chunk);
    }
  }

  return Buffer.concat(chunks).toString("utf8");
}

async function main() {
  const config = EnvSchema.safeParse(env);
  if (!config.success) {
    stderr.write(["Invalid environment:", ...formatIssues(config.error)].join("\n") + "\n");
    exit(1);
    return;
  }

  const report = buildReport(await readAllStdin(), toParseOptions(config.data));
  if (!report) {
    stderr.write("No dates provided on stdin.\n");
    exit(1);
    return;
  }

  stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

main().catch((error) => {
  stderr.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
  exit(1);
});
