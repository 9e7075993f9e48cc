import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createWriteStream } from "fs";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  Logger,
  LogLevel,
  LogLevelNames,
  createLogger,
  parseLogLevel,
} from "../src/logger.js";

vi.mock("fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs")>();
  return { ...actual, createWriteStream: vi.fn(actual.createWriteStream) };
});

// Mock console methods
const originalConsoleLog = console.log;
const originalConsoleError = console.error;
let consoleOutput: string[] = [];
let errorOutput: string[] = [];

const plain = { colorize: false, timestamp: false };

describe("Logger", () => {
  beforeEach(() => {
    consoleOutput = [];
    errorOutput = [];

    console.log = vi.fn().mockImplementation((message: string) => {
      consoleOutput.push(message);
    });
    console.error = vi.fn().mockImplementation((message: string) => {
      errorOutput.push(message);
    });
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
  });

  describe("LogLevel", () => {
    it("should order levels from TRACE to FATAL", () => {
      expect(LogLevel.TRACE).toBe(0);
      expect(LogLevel.INFO).toBe(2);
      expect(LogLevel.FATAL).toBe(5);
      expect(LogLevelNames[LogLevel.WARN]).toBe("WARN");
    });

    it("should parse level names case-insensitively", () => {
      expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
      expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
      expect(parseLogLevel("loud")).toBe(LogLevel.INFO);
      expect(parseLogLevel()).toBe(LogLevel.INFO);
    });
  });

  describe("Output Formats", () => {
    it("should format human-readable output", () => {
      const testLogger = new Logger({ ...plain, component: "Driver" });

      testLogger.info("Fixing layer.dart...", { entity: "WordOrderLayer" });

      expect(consoleOutput).toEqual([
        'INFO  [Driver] Fixing layer.dart... {"entity":"WordOrderLayer"}',
      ]);
    });

    it("should format JSON output", () => {
      const testLogger = new Logger({
        ...plain,
        outputFormat: "json",
        component: "Driver",
      });

      testLogger.warn("two candidates", { filePath: "a.dart" });

      const entry: unknown = JSON.parse(consoleOutput[0]);
      expect(entry).toMatchObject({
        level: "WARN",
        message: "two candidates",
        component: "Driver",
        context: { filePath: "a.dart" },
      });
    });

    it("should prefix an ISO timestamp when enabled", () => {
      const testLogger = new Logger({ colorize: false, timestamp: true });

      testLogger.info("stamped");

      expect(consoleOutput[0]).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  stamped$/,
      );
    });
  });

  describe("Log Level Filtering", () => {
    it("should drop messages below the threshold", () => {
      const testLogger = new Logger({ ...plain, level: LogLevel.WARN });

      testLogger.debug("hidden");
      testLogger.info("hidden");
      testLogger.warn("shown");

      expect(consoleOutput).toEqual(["WARN  shown"]);
    });

    it("should lower the threshold for verbose and very verbose", () => {
      expect(new Logger({ verbose: true }).getState().level).toBe(
        LogLevel.DEBUG,
      );
      expect(new Logger({ veryVerbose: true }).getState()).toMatchObject({
        level: LogLevel.TRACE,
        verbose: true,
        veryVerbose: true,
      });
    });

    it("should let quiet override verbose", () => {
      const state = new Logger({ verbose: true, quiet: true }).getState();

      expect(state.level).toBe(LogLevel.WARN);
      expect(state.verbose).toBe(false);
    });

    it("should print nothing when silent", () => {
      const testLogger = new Logger({ ...plain, silent: true });

      testLogger.error("nope");

      expect(consoleOutput).toEqual([]);
      expect(errorOutput).toEqual([]);
    });
  });

  describe("Error Logging", () => {
    it("should send errors to stderr with their stack", () => {
      const testLogger = new Logger(plain);
      const error = new Error("write failed");

      testLogger.error(error);

      expect(consoleOutput).toEqual([]);
      expect(errorOutput).toHaveLength(1);
      expect(errorOutput[0]).toContain("ERROR write failed\n");
      expect(errorOutput[0]).toContain("Error: write failed");
    });

    it("should log string fatals to stderr", () => {
      const testLogger = new Logger(plain);

      testLogger.fatal("stopping");

      expect(errorOutput).toEqual(["FATAL stopping"]);
    });
  });

  describe("Child Loggers", () => {
    it("should inherit settings and take a new component", () => {
      const parent = new Logger({ ...plain, level: LogLevel.DEBUG });
      const child = parent.child("Config");

      child.debug("loaded");

      expect(consoleOutput).toEqual(["DEBUG [Config] loaded"]);
    });

    it("should accept overrides", () => {
      const parent = new Logger({ ...plain, level: LogLevel.DEBUG });
      const child = parent.child("Quiet", { level: LogLevel.ERROR });

      child.info("hidden");

      expect(consoleOutput).toEqual([]);
    });

    it("should build component loggers from the default logger", () => {
      const component = createLogger("Rules", { level: LogLevel.INFO, ...plain });

      component.info("ready");

      expect(consoleOutput).toEqual(["INFO  [Rules] ready"]);
    });
  });

  describe("Timing and File Operations", () => {
    it("should log timing at debug level", () => {
      const testLogger = new Logger({ ...plain, level: LogLevel.DEBUG });

      testLogger.timing("rewrite", 12);

      expect(consoleOutput).toEqual([
        'DEBUG Operation "rewrite" completed in 12ms {"operation":"rewrite","processingTime":12}',
      ]);
    });

    it("should only report file operations when very verbose", () => {
      new Logger(plain).fileOperation("write", "a.dart", { size: 10 });
      expect(consoleOutput).toEqual([]);

      new Logger({ ...plain, veryVerbose: true }).fileOperation(
        "write",
        "a.dart",
        { size: 10 },
      );
      expect(consoleOutput).toEqual([
        'TRACE write: a.dart (10 bytes) {"operation":"write","filePath":"a.dart","fileSize":10}',
      ]);
    });
  });

  describe("Progress Tracking", () => {
    it("should report progress when verbose", () => {
      const testLogger = new Logger({
        ...plain,
        verbose: true,
        enableProgressTracking: true,
      });

      testLogger.startProgress("entities", { total: 2, label: "Rewriting" });
      testLogger.updateProgress("entities", 1, "WordOrderLayer");

      expect(consoleOutput).toEqual([
        "INFO  Starting Rewriting (0/2)",
        "DEBUG Rewriting: 1/2 (50%) - WordOrderLayer",
      ]);
      expect(testLogger.getState().activeProgressCount).toBe(1);

      testLogger.completeProgress("entities");
      expect(testLogger.getState().activeProgressCount).toBe(0);
    });

    it("should ignore progress calls when tracking is disabled", () => {
      const testLogger = new Logger({
        ...plain,
        verbose: true,
        enableProgressTracking: false,
      });

      testLogger.startProgress("entities", { total: 1 });

      expect(consoleOutput).toEqual([]);
      expect(testLogger.getState().activeProgressCount).toBe(0);
    });
  });

  describe("File Output", () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), "logger-"));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it("should append JSON lines to the log file", async () => {
      const filePath = path.join(testDir, "logs", "run.log");
      const testLogger = new Logger({
        ...plain,
        fileOutput: { filePath, format: "json" },
      });

      testLogger.info("first");
      testLogger.warn("second");
      testLogger.cleanup();

      await vi.waitFor(async () => {
        const lines = (await fs.readFile(filePath, "utf8")).trim().split("\n");
        expect(lines.map((line) => JSON.parse(line).message)).toEqual([
          "first",
          "second",
        ]);
      });
    });

    it("should let child loggers share the parent's file", async () => {
      const filePath = path.join(testDir, "shared.log");
      const parent = new Logger({
        ...plain,
        component: "CLI",
        fileOutput: { filePath, format: "human" },
      });
      const children = Array.from({ length: 20 }, (_, i) =>
        parent.child(`Child${i}`),
      );

      parent.info("parent line");
      children[0].info("child line");
      children[0].cleanup();
      parent.warn("after child cleanup");
      parent.cleanup();

      expect(vi.mocked(createWriteStream)).toHaveBeenCalledTimes(1);
      await vi.waitFor(async () => {
        const content = await fs.readFile(filePath, "utf8");
        expect(content).toBe(
          "INFO  [CLI] parent line\n" +
            "INFO  [Child0] child line\n" +
            "WARN  [CLI] after child cleanup\n",
        );
      });
    });

    it("should give a child its own file when asked", () => {
      const parent = new Logger({
        ...plain,
        fileOutput: { filePath: path.join(testDir, "parent.log") },
      });
      const child = parent.child("Own", {
        fileOutput: { filePath: path.join(testDir, "child.log") },
      });

      expect(vi.mocked(createWriteStream)).toHaveBeenCalledTimes(2);
      child.cleanup();
      parent.cleanup();
    });

    it("should write quoted CSV rows", async () => {
      const filePath = path.join(testDir, "run.csv");
      const testLogger = new Logger({
        ...plain,
        component: "CLI",
        fileOutput: { filePath, format: "csv" },
      });

      testLogger.info('say "hi"');
      testLogger.cleanup();

      await vi.waitFor(async () => {
        const content = await fs.readFile(filePath, "utf8");
        expect(content).toMatch(/^"[^"]+","INFO","CLI","say ""hi""","",""\n$/);
      });
    });
  });
});
