import { expect, it, vi } from "vitest";
import { parentPort } from "node:worker_threads";

import { loggerFactory } from "./index.mjs";

vi.mock("node:worker_threads", () => ({
  isMainThread: false,
  parentPort: { postMessage: vi.fn() },
}));

it("should post messages to the parent in worker threads", () => {
  const lines: string[] = [];
  const { logger } = loggerFactory({
    level: "info",
    destination: { write: (msg: string) => void lines.push(msg) },
  });

  logger.info("test message", { key: "value" });

  // eslint-disable-next-line @typescript-eslint/unbound-method
  expect(parentPort?.postMessage).toHaveBeenCalledWith({
    type: "message",
    level: "info",
    message: "test message",
    meta: { key: "value" },
  });
  expect(lines).toEqual([]);
});
