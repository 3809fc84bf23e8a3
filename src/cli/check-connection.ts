#!/usr/bin/env node
import { runConnectionCheck } from "../composition/root";
import { reportCliFailure } from "./failureEnvelope";

/** Prints the connection report; exit code 0 only when the token was accepted. */
export const executeCheckConnectionCli = async (): Promise<void> => {
  let exitCode = 1;
  try {
    const report = await runConnectionCheck();
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "crm.connection_checked", ...report }));
    exitCode = report.tokenValid ? 0 : 1;
  } catch (err) {
    reportCliFailure(err, "check_connection.failed");
  }
  process.exit(exitCode);
};

if (require.main === module) {
  void executeCheckConnectionCli();
}
