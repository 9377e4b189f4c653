/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resolveTablePath, isVerbose } from "../src/lib/env.js";
import * as path from "node:path";
import { homedir } from "node:os";

describe("environment resolution", () => {
  let originalTable: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalTable = process.env.TICKETDESK_TABLE;
    originalDebug = process.env.TICKETDESK_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalTable !== undefined) {
      process.env.TICKETDESK_TABLE = originalTable;
    } else {
      delete process.env.TICKETDESK_TABLE;
    }
    if (originalDebug !== undefined) {
      process.env.TICKETDESK_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.TICKETDESK_CLI_DEBUG;
    }
  });

  describe("resolveTablePath", () => {
    it("should use CLI option when provided", () => {
      process.env.TICKETDESK_TABLE = "/env/tickets.yaml";
      expect(resolveTablePath("/cli/tickets.yaml")).toBe(path.resolve("/cli/tickets.yaml"));
    });

    it("should use TICKETDESK_TABLE env var when CLI option not provided", () => {
      process.env.TICKETDESK_TABLE = "/env/tickets.yaml";
      expect(resolveTablePath()).toBe(path.resolve("/env/tickets.yaml"));
    });

    it("should use default ./tickets.yaml when neither provided", () => {
      delete process.env.TICKETDESK_TABLE;
      expect(resolveTablePath()).toBe(path.resolve("./tickets.yaml"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveTablePath("~")).toBe(path.resolve(homedir()));
      expect(resolveTablePath("~/events/ball.yaml")).toBe(
        path.resolve(path.join(homedir(), "events/ball.yaml"))
      );
    });

    it("should leave ~user paths alone", () => {
      expect(resolveTablePath("~someone/ball.yaml")).toBe(path.resolve("~someone/ball.yaml"));
    });
  });

  describe("isVerbose", () => {
    it("should only be enabled by TICKETDESK_CLI_DEBUG=1", () => {
      delete process.env.TICKETDESK_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      process.env.TICKETDESK_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
      process.env.TICKETDESK_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
