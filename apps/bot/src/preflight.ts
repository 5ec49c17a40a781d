/**
 * Preflight Checks
 *
 * Validates system readiness before accepting updates:
 * 1. The database answers a trivial query
 * 2. The bot token is accepted by Telegram (getMe)
 * 3. The main channel is configured in a form membership lookups accept
 *
 * Fails fast if critical dependencies are not ready.
 */

import { log } from "./logger.js";
import type { Repository } from "./repository/types.js";
import type { BotIdentity, Transport } from "./transport/types.js";

export interface PreflightCheck {
  name: string;
  passed: boolean;
  message: string;
  critical: boolean;
}

export interface PreflightResult {
  ready: boolean;
  checks: PreflightCheck[];
  /** Set when getMe succeeded */
  identity: BotIdentity | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function checkDatabase(repository: Pick<Repository, "ping" | "dialect">): Promise<PreflightCheck> {
  try {
    await repository.ping();
    return { name: "database", passed: true, message: `Connected (${repository.dialect})`, critical: true };
  } catch (error) {
    return {
      name: "database",
      passed: false,
      message: `Connection failed: ${errorMessage(error)}`,
      critical: true,
    };
  }
}

async function checkTelegram(
  transport: Pick<Transport, "getMe">
): Promise<{ check: PreflightCheck; identity: BotIdentity | null }> {
  try {
    const identity = await transport.getMe();
    return {
      check: { name: "telegram", passed: true, message: `Authorized as @${identity.username}`, critical: true },
      identity,
    };
  } catch (error) {
    return {
      check: {
        name: "telegram",
        passed: false,
        message: `getMe failed: ${errorMessage(error)}`,
        critical: true,
      },
      identity: null,
    };
  }
}

/**
 * Membership lookups take a public @username or a numeric chat id.
 */
function checkMainChannel(channel: string): PreflightCheck {
  const valid = /^@[A-Za-z0-9_]{5,}$/.test(channel) || /^-100\d+$/.test(channel);
  return {
    name: "main-channel",
    passed: valid,
    message: valid ? channel : `'${channel}' is neither an @username nor a -100… chat id`,
    critical: false,
  };
}

export async function runPreflightChecks(
  repository: Pick<Repository, "ping" | "dialect">,
  transport: Pick<Transport, "getMe">,
  mainChannel: string
): Promise<PreflightResult> {
  const checks: PreflightCheck[] = [];

  // Run checks
  checks.push(await checkDatabase(repository));
  const telegram = await checkTelegram(transport);
  checks.push(telegram.check);
  checks.push(checkMainChannel(mainChannel));

  // Determine if ready (all critical checks must pass)
  const criticalFailed = checks.filter((c) => c.critical && !c.passed);
  const ready = criticalFailed.length === 0;

  // Log results
  for (const check of checks) {
    if (check.passed) {
      log.system.info({ check: check.name }, `✓ ${check.message}`);
    } else if (check.critical) {
      log.system.error({ check: check.name }, `✗ ${check.message}`);
    } else {
      log.system.warn({ check: check.name }, `⚠ ${check.message}`);
    }
  }

  if (ready) {
    log.system.info({}, "Preflight checks passed");
  } else {
    log.system.error(
      { failed: criticalFailed.map((c) => c.name) },
      "Preflight checks FAILED - not ready to accept updates"
    );
  }

  return { ready, checks, identity: telegram.identity };
}
