/**
 * Tests for the pilkit configuration loader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError, resolveConfig } from "./config.js";

function withDirs(fn: (project: string, home: string) => void): void {
  const project = fs.mkdtempSync(path.join(os.tmpdir(), "pilkit-test-project-"));
  const home = fs.mkdtempSync(path.join(os.tmpdir(), "pilkit-test-home-"));
  try {
    fn(project, home);
  } finally {
    fs.rmSync(project, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  }
}

function writeUserConfig(home: string, data: unknown): string {
  const dir = path.join(home, ".pilkit");
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, JSON.stringify(data));
  return file;
}

describe("resolveConfig", () => {
  it("returns defaults when no config files exist", () => {
    withDirs((project, home) => {
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "default");
      assert.equal(resolved.path, null);
      assert.deepEqual(resolved.config, { version: 1, unknownCells: "fail", maxPassesPerRow: 100 });
    });
  });

  it("loads the project config and fills in defaults", () => {
    withDirs((project, home) => {
      const file = path.join(project, ".pilkit.json");
      fs.writeFileSync(file, JSON.stringify({ version: 1, unknownCells: "zero" }));
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "project");
      assert.equal(resolved.path, file);
      assert.deepEqual(resolved.config, { version: 1, unknownCells: "zero", maxPassesPerRow: 100 });
    });
  });

  it("prefers the project config over the user config", () => {
    withDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".pilkit.json"), JSON.stringify({ version: 1, maxPassesPerRow: 7 }));
      writeUserConfig(home, { version: 1, maxPassesPerRow: 9 });
      assert.equal(resolveConfig(project, home).config.maxPassesPerRow, 7);
    });
  });

  it("falls back to the user config", () => {
    withDirs((project, home) => {
      const file = writeUserConfig(home, { version: 1, maxPassesPerRow: 9 });
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "user");
      assert.equal(resolved.path, file);
      assert.equal(resolved.config.maxPassesPerRow, 9);
    });
  });

  it("rejects invalid values", () => {
    withDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".pilkit.json"), JSON.stringify({ version: 1, unknownCells: "maybe" }));
      assert.throws(
        () => resolveConfig(project, home),
        (e: unknown) => e instanceof ConfigError && e.message.includes("unknownCells:")
      );
    });
  });

  it("rejects a wrong version", () => {
    withDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".pilkit.json"), JSON.stringify({ version: 2 }));
      assert.throws(() => resolveConfig(project, home), /version: Config 'version' must be 1/);
    });
  });

  it("rejects unknown keys", () => {
    withDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".pilkit.json"), JSON.stringify({ version: 1, extra: true }));
      assert.throws(() => resolveConfig(project, home), /extra/);
    });
  });

  it("rejects malformed JSON", () => {
    withDirs((project, home) => {
      const file = path.join(project, ".pilkit.json");
      fs.writeFileSync(file, "not valid json{{{");
      assert.throws(
        () => resolveConfig(project, home),
        (e: unknown) => e instanceof ConfigError && e.path === file
      );
    });
  });
});
