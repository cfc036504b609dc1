/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const { env } = process;

const numberOr = (value: string | undefined, fallback: number) => {
  const parsed = value === undefined ? NaN : Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export type ExportConfig = {
  /** Directory that exported templates are written to */
  templatesDir: string;
  /** Path to the CloudFormation resource specification JSON document */
  specPath: string;
  /** Nested ARNs deeper than this are left unexpanded */
  maxDepth: number;
  /** Per-call timeout for AWS read operations */
  timeoutMillis: number;
  /** Region used for ARNs that omit one (e.g. IAM) */
  defaultRegion: string;
  /** When set, traces are exported to this OTLP/HTTP endpoint */
  otlpTracesEndpoint: string | undefined;
};

export const defaultConfig: ExportConfig = {
  templatesDir: env.ARNEXPORT_TEMPLATES_DIR ?? "templates",
  // Falls back to the specification subset bundled with the CLI
  specPath:
    env.ARNEXPORT_SPEC_PATH ??
    path.resolve(
      __dirname,
      "../../data/CloudFormationResourceSpecification.json"
    ),
  maxDepth: numberOr(env.ARNEXPORT_MAX_DEPTH, 10),
  timeoutMillis: numberOr(env.ARNEXPORT_TIMEOUT_MS, 30_000),
  defaultRegion: env.ARNEXPORT_DEFAULT_REGION ?? "us-east-1",
  otlpTracesEndpoint: env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
};
