import assert from "node:assert/strict";
import test from "node:test";
import { Logger, LogLevel, parseLogLevel } from "./logger";

function capture(level: string): { logger: Logger; lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> } {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  const logger = new Logger("crawler", level, (lineLevel, line) => {
    lines.push({ level: lineLevel, entry: JSON.parse(line) });
  });
  return { logger, lines };
}

test("parseLogLevel falls back to info for unknown input", () => {
  assert.equal(parseLogLevel(" DEBUG "), "debug");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});

test("lines below the configured level are dropped", () => {
  const { logger, lines } = capture("warn");
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");
  logger.error("shown too");

  assert.deepEqual(
    lines.map((line) => [line.level, line.entry.message]),
    [
      ["warn", "shown"],
      ["error", "shown too"]
    ]
  );
});

test("metadata is serialized without undefined keys", () => {
  const { logger, lines } = capture("info");
  logger.info("fetch_failed", { url: "https://example.lk/a", status: undefined, attempts: 3 });

  assert.equal(lines.length, 1);
  const entry = lines[0]?.entry;
  assert.equal(entry?.scope, "crawler");
  assert.equal(entry?.level, "info");
  assert.deepEqual(entry?.metadata, { url: "https://example.lk/a", attempts: 3 });
  assert.equal(typeof entry?.ts, "string");
});

test("errors are reduced to name and message", () => {
  const { logger, lines } = capture("info");
  logger.error("write_failed", { error: new RangeError("disk full") });

  const metadata = lines[0]?.entry.metadata;
  assert.ok(metadata && typeof metadata === "object" && "error" in metadata);
  const error = metadata.error;
  assert.ok(error && typeof error === "object" && "name" in error && "message" in error);
  assert.equal(error.name, "RangeError");
  assert.equal(error.message, "disk full");
});

test("child loggers nest their scope and keep the level", () => {
  const { logger, lines } = capture("info");
  const child = logger.child("discovery");
  child.debug("hidden");
  child.info("sitemap_loaded");

  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.entry.scope, "crawler.discovery");
});
