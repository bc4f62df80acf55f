import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export function loadDotEnv(): void {
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "backend", ".env")
  ];

  const envPath = candidates.find((p) => fs.existsSync(p));
  if (!envPath) return;

  dotenv.config({ path: envPath });
}
