/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
import { sleep, timeout } from "../util";
import { describe, expect, it } from "vitest";

describe("timeout() function", () => {
  it("resolves with the wrapped value", async () => {
    await expect(timeout(Promise.resolve("done"), 1000)).resolves.toBe("done");
  });

  it("passes rejections through", async () => {
    const error = new Error("boom");
    await expect(timeout(Promise.reject(error), 1000)).rejects.toBe(error);
  });

  it("throws the timeout error for slow promises", async () => {
    await expect(
      timeout(new Promise(() => {}), 5, () => new Error("too slow"))
    ).rejects.toThrow("too slow");
  });

  it("defaults to a generic timeout error", async () => {
    await expect(timeout(sleep(1000), 5)).rejects.toThrow("Timeout");
  });
});
