/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { defaultConfig } from "../drivers/env";
import { versionInfo } from "../version";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";

let sdk: NodeSDK | undefined = undefined;

const shutdownSdk = () => {
  const running = sdk;
  sdk = undefined;
  if (!running) return;
  void running.shutdown().finally(() => {
    process.exit();
  });
};

/** Starts exporting traces, if an OTLP endpoint is configured
 *
 * Without an endpoint the OpenTelemetry API stays a no-op.
 */
export const startTracing = async () => {
  const url = defaultConfig.otlpTracesEndpoint;
  if (!url) return;

  const { name, version } = await versionInfo;
  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: name,
      [ATTR_SERVICE_VERSION]: version,
    }),
    traceExporter: new OTLPTraceExporter({ url }),
  });
  sdk.start();

  // These handlers are necessary to ensure spans are flushed when the CLI exits.
  process.on("SIGINT", shutdownSdk);
  process.on("SIGTERM", shutdownSdk);
  process.on("beforeExit", shutdownSdk);
};
