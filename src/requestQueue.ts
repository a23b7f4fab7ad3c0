/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

/**
 * Runs async tasks strictly one after another, in submission order.
 * The UNO's web server handles a single connection at a time, so overlapping
 * tool calls are lined up here instead of racing on the socket.
 */
export class RequestQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this.pendingCount;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pendingCount += 1;
    const result = this.tail.then(task).finally(() => {
      this.pendingCount -= 1;
    });
    // A failed task must not block the ones behind it.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
