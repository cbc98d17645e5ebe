import "dotenv/config";
import { main } from "./cli";

void main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`kubeward: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  },
);
