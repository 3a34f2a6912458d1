import { ConfigError } from "./errors";
import { runCli } from "./cli";

const abort = new AbortController();
process.once("SIGINT", () => abort.abort());
process.once("SIGTERM", () => abort.abort());

runCli(process.argv.slice(2), { signal: abort.signal })
  .then((stats) => {
    if (stats?.stopReason === "too-many-failures") {
      process.exitCode = 1;
    }
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error("deck-controller failed", err);
    }
    process.exitCode = 1;
  });
