// robots.txt policy gate - fail-closed, with an append-only audit log

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import robotsParser from "robots-parser";
import type { PolicyDecision, PolicyGate } from "../types";

type RobotsRules = ReturnType<typeof robotsParser>;

/** Outcome of reading one origin's robots.txt */
type RobotsLookup =
  | { kind: "rules"; rules: RobotsRules }
  | { kind: "allow-all" }
  | { kind: "deny-all"; reason: string }
  | { kind: "unreadable"; reason: string };

export const WILDCARD_AGENT = "*";

export interface RobotsPolicyGateOptions {
  /** Audit log file; null disables file logging */
  auditLogPath?: string | null;
  timeout?: number;
  /** Keep parsed rules per origin for the lifetime of this gate */
  cacheByOrigin?: boolean;
  userAgent?: string;
}

export class RobotsPolicyGate implements PolicyGate {
  private auditLogPath: string | null;
  private timeout: number;
  private cacheByOrigin: boolean;
  private userAgent: string;
  private origins: Map<string, RobotsLookup> = new Map();
  private decisions: Array<{ url: string; decision: PolicyDecision }> = [];

  constructor(options?: RobotsPolicyGateOptions) {
    this.auditLogPath = options?.auditLogPath ?? null;
    this.timeout = options?.timeout ?? 10000;
    this.cacheByOrigin = options?.cacheByOrigin ?? false;
    this.userAgent = options?.userAgent ?? "siteseek/0.1 (robots check)";
  }

  async allowed(url: string): Promise<boolean> {
    const decision = await this.decide(url);
    return decision === "allowed";
  }

  async decide(url: string): Promise<PolicyDecision> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      await this.record(url, "unreadable", "invalid URL");
      return "unreadable";
    }

    const lookup = await this.lookup(parsed);

    switch (lookup.kind) {
      case "allow-all":
        await this.record(url, "allowed");
        return "allowed";
      case "deny-all":
        await this.record(url, "blocked", lookup.reason);
        return "blocked";
      case "unreadable":
        await this.record(url, "unreadable", lookup.reason);
        return "unreadable";
      case "rules": {
        // isAllowed is undefined for URLs outside the robots.txt origin
        const verdict = lookup.rules.isAllowed(url, WILDCARD_AGENT) === true ? "allowed" : "blocked";
        await this.record(url, verdict);
        return verdict;
      }
    }
  }

  /** Decisions made by this gate, oldest first */
  get history(): ReadonlyArray<{ url: string; decision: PolicyDecision }> {
    return this.decisions;
  }

  private async lookup(url: URL): Promise<RobotsLookup> {
    const origin = url.origin;
    const cached = this.cacheByOrigin ? this.origins.get(origin) : undefined;
    if (cached) {
      return cached;
    }

    const lookup = await this.readRobots(`${url.protocol}//${url.host}/robots.txt`);
    // unreadable lookups are not cached so the next URL tries again
    if (this.cacheByOrigin && lookup.kind !== "unreadable") {
      this.origins.set(origin, lookup);
    }
    return lookup;
  }

  private async readRobots(robotsUrl: string): Promise<RobotsLookup> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(robotsUrl, {
        headers: { "User-Agent": this.userAgent },
        signal: controller.signal,
        redirect: "follow",
      });

      if (response.status === 401 || response.status === 403) {
        return { kind: "deny-all", reason: `robots.txt returned HTTP ${response.status}` };
      }
      if (response.status >= 400 && response.status < 500) {
        return { kind: "allow-all" };
      }
      if (!response.ok) {
        return { kind: "unreadable", reason: `robots.txt returned HTTP ${response.status}` };
      }

      const body = await response.text();
      return { kind: "rules", rules: robotsParser(robotsUrl, body) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { kind: "unreadable", reason: message };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async record(url: string, decision: PolicyDecision, reason?: string): Promise<void> {
    this.decisions.push({ url, decision });

    if (decision === "allowed") {
      console.log(`[robots] Allowed: ${url}`);
    } else if (decision === "blocked") {
      console.warn(`[robots] Disallowed: ${url}`);
    } else {
      console.warn(`[robots] Could not read robots.txt for ${url} (${reason ?? "unknown"}), defaulting to disallow`);
    }

    if (!this.auditLogPath) return;

    const line = formatAuditLine(url, decision, reason);
    try {
      await mkdir(dirname(this.auditLogPath), { recursive: true });
      await appendFile(this.auditLogPath, line + "\n", "utf-8");
    } catch (error) {
      console.error(`[robots] Failed to write audit log ${this.auditLogPath}:`, error);
    }
  }
}

export function formatAuditLine(url: string, decision: PolicyDecision, reason?: string): string {
  switch (decision) {
    case "allowed":
      return `[ALLOWED] ${url}`;
    case "blocked":
      return `[BLOCKED] ${url}`;
    case "unreadable":
      return `[UNREADABLE] ${url} (${reason ?? "unknown"})`;
  }
}
