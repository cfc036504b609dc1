#!/usr/bin/env node
/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { getCli } from "./commands";
import { print2 } from "./drivers/stdio";
import { startTracing } from "./opentelemetry/instrumentation";
import { traceSpan } from "./opentelemetry/otel-helpers";
import { noop } from "lodash";

export const main = async () => {
  // Tracing must be started before the first span is created
  await startTracing();
  await traceSpan("main", run);
};

const run = async () => {
  const cli = await getCli();
  // We can suppress output here, as .fail() already print2 errors
  await Promise.resolve(cli.parse()).catch(noop);
};

// Global error handlers, to avoid ungraceful crashes and to log errors that aren't caught elsewhere.
// We still exit with a non-zero code to indicate failure.
process.on("uncaughtException", (error) => {
  print2("Uncaught Exception: " + error.message);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  print2(
    "Unhandled Rejection: " +
      (reason instanceof Error ? reason.message : String(reason))
  );
  process.exit(1);
});

if (require.main === module) {
  void main();
}
