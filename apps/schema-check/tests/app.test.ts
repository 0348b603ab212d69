import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { afterEach, describe, expect, it, vi } from "vitest";

import { ROOT_ENV_PATH, run } from "../src/app";
import { usage } from "../src/cli";

describe("run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("prints usage and exits 0 without any database configuration", async () => {
    vi.stubEnv("DATABASE_URL", "");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await expect(run(["--help"])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(usage());
  });
});

describe("ROOT_ENV_PATH", () => {
  it("points at .env in the repository root", () => {
    const root = resolve(dirname(fileURLToPath(import.meta.url)), "../../..");

    expect(ROOT_ENV_PATH).toBe(resolve(root, ".env"));
  });
});
