import { loadDotEnv } from "./env-file";
import { safeLog } from "./utils/redact";
import { createApp } from "./app";

loadDotEnv();

function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}

const app = createApp();

const host = process.env.HOST?.trim() || "0.0.0.0";
const port = Number.parseInt(process.env.PORT ?? "3000", 10);
app.listen(port, host, () => {
  safeLog("[backend] listening", { host, port, version: getVersion() });
});
