#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./observability";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(JSON.stringify({ ts: new Date().toISOString(), level: "error", msg: "fatal", error: errorMessage(error) }));
    process.exitCode = 1;
  });
