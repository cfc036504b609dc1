/** Copyright © 2024-present P0 Security

This file is part of @p0security/cli

@p0security/cli is free software: you can redistribute it and/or modify it under the terms of the GNU General Public License as published by the Free Software Foundation, version 3 of the License.

@p0security/cli is distributed in the hope that it will be useful, but WITHOUT ANY WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the GNU General Public License for more details.

You should have received a copy of the GNU General Public License along with @p0security/cli. If not, see <https://www.gnu.org/licenses/>.
**/
const TIMED_OUT: unique symbol = Symbol("timed out");

/** Waits the specified delay (in ms)
 *
 * The returned promise is cancelable:
 * ```
 * const wait = sleep(10);
 * ...
 * wait.cancel();
 * ```
 */
export const sleep = (timeoutMillis: number) => {
  let timer: NodeJS.Timeout | undefined = undefined;
  const promise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, timeoutMillis);
  });
  return Object.assign(promise, { cancel: () => clearTimeout(timer) });
};

/** Wrap a promise in a timeout
 *
 * If the promise does not settle within the interval, throws the error
 * returned by `onTimeout`.
 */
export const timeout = async <T>(
  promise: Promise<T>,
  timeoutMillis: number,
  onTimeout: () => Error = () => new Error("Timeout")
): Promise<T> => {
  const wait = sleep(timeoutMillis);
  try {
    const result = await Promise.race([
      wait.then((): typeof TIMED_OUT => TIMED_OUT),
      promise,
    ]);
    if (result === TIMED_OUT) throw onTimeout();
    return result;
  } finally {
    wait.cancel();
  }
};
