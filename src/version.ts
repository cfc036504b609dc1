/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import fs from "node:fs";

type VersionInfo = {
  name: string;
  version: string;
};

const loadCurrentVersion = (): VersionInfo => {
  try {
    // package.json sits at the project root, whether this runs from
    // <root>/src/version.ts or from <root>/dist/version.js
    const { name, version } = JSON.parse(
      fs.readFileSync(`${__dirname}/../package.json`).toString("utf-8")
    );
    return {
      name: typeof name === "string" ? name : "arn-export",
      version: typeof version === "string" ? version : "unknown",
    };
  } catch {
    return { name: "arn-export", version: "unknown" };
  }
};

// The importer needs to await this promise to actually read the version number
// e.g. `const { name, version } = await versionInfo;`
//
// This allows us to memoize the version info and avoid reading the
// package.json file multiple times
export const versionInfo = Promise.resolve(loadCurrentVersion());
