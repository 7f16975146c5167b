import { afterEach, beforeEach, vi } from "vitest";

// The server logs to stderr; keep test output readable.
beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});
