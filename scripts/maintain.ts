#!/usr/bin/env npx tsx
/**
 * Portal Slot Watcher - Maintenance Utility
 *
 * Usage:
 *   npx tsx scripts/maintain.ts <command> [options]
 *
 * Commands:
 *   status                 Show configuration and stored slot counts
 *   scrape                 Run one sync cycle now
 *   slots [date] [--free]  Show the stored week containing date
 *   book <date> <passNo>   Book a slot
 *   cancel <bookingId>     Cancel a booking
 *   login                  Check the portal credentials
 */

import { createServices, type AppServices } from "../src/lib/app";
import { loadConfig, redactConfig } from "../src/lib/config";
import { ConfigError } from "../src/lib/errors";
import { createLogger } from "../src/lib/logger";
import { SLOT_STATUSES } from "../src/lib/types";
import { formatBytes } from "../src/lib/portal/transport";
import { addDays, isIsoDate, localIsoDate, mondayOnOrBefore } from "../src/lib/utils/dates";
import { buildWeekView } from "../src/lib/week-view";

const args = process.argv.slice(2);
const command = args[0];

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
};

function log(message: string, color?: keyof typeof colors) {
  const c = color ? colors[color] : "";
  console.log(`${c}${message}${colors.reset}`);
}

function header(title: string) {
  console.log();
  log(`═══ ${title} ═══`, "bright");
  console.log();
}

const statusColor = { free: "green", own: "cyan", busy: "dim" } as const;

async function showStatus(services: AppServices) {
  header("System Status");

  const config = redactConfig(services.config);
  log("Configuration:", "cyan");
  console.log(JSON.stringify(config, null, 2).replace(/^/gm, "  "));

  const all = await services.store.findAll();
  console.log();
  log("Stored Slots:", "cyan");
  console.log(`  Total:  ${all.length}`);
  for (const status of SLOT_STATUSES) {
    console.log(`  ${status.padEnd(6)}  ${all.filter((s) => s.status === status).length}`);
  }

  if (all.length > 0) {
    console.log(`  Range:  ${all[0].date} → ${all[all.length - 1].date}`);
  }

  console.log();
  log("Notifications:", "cyan");
  console.log(`  Telegram: ${services.telegram ? "✓ Configured" : "✗ Not set (log only)"}`);
}

async function runScrape(services: AppServices) {
  header("Sync Cycle");

  const report = await services.engine.runCycle();

  if (report.status === "login-failed") {
    log(`✗ Login failed after ${report.loginAttempts} attempt(s): ${report.loginFailure?.message ?? "unknown"}`, "red");
    return;
  }

  for (const week of report.weeks) {
    const color = week.status === "ok" ? "green" : "red";
    const detail = week.status === "ok" ? `${week.slots} slots, ${week.freed} freed` : week.error ?? week.status;
    log(`  ${week.status === "ok" ? "✓" : "✗"} Week of ${week.startDate}: ${detail}`, color);
  }

  console.log();
  if (report.freed.length > 0) {
    log(`${report.freed.length} slot(s) freed up:`, "yellow");
    for (const t of report.freed) {
      console.log(`  ${t.key.date} ${services.config.schedule.label(t.key.passNo)} (was ${t.oldStatus})`);
    }
  } else {
    log("No newly freed slots", "dim");
  }
  log(`Done in ${report.durationMs}ms`, "dim");
}

async function showSlots(services: AppServices) {
  const freeOnly = args.includes("--free");
  const dateArg = args.slice(1).find((a) => !a.startsWith("--"));
  const date = dateArg ?? localIsoDate(new Date());

  if (!isIsoDate(date)) {
    log("Usage: npx tsx scripts/maintain.ts slots [YYYY-MM-DD] [--free]", "yellow");
    process.exit(1);
  }

  const monday = mondayOnOrBefore(date);
  const stored = await services.store.findBetween(monday, addDays(monday, 6));
  const view = buildWeekView(stored, services.config.schedule, date, freeOnly);

  header(`Week ${view.weekNumber} (${view.startDate} → ${view.endDate})`);

  for (const day of view.days) {
    log(`${day.weekday} ${day.date}`, "bright");
    if (day.slots.length === 0) {
      log("  (no slots)", "dim");
      continue;
    }
    for (const slot of day.slots) {
      log(`  [${slot.passNo}] ${slot.time}  ${slot.status}`, statusColor[slot.status]);
    }
  }

  console.log();
  log(`Previous: ${view.previousWeek}   Next: ${view.nextWeek}`, "dim");
}

async function bookSlot(services: AppServices) {
  const date = args[1];
  const passNo = Number(args[2]);

  if (!date || !isIsoDate(date) || !Number.isInteger(passNo) || !services.config.schedule.intervalFor(passNo)) {
    log("Usage: npx tsx scripts/maintain.ts book <YYYY-MM-DD> <passNo>", "yellow");
    process.exit(1);
  }

  header("Book Slot");
  log(`Booking ${date} ${services.config.schedule.label(passNo)}...`, "blue");

  const reply = await services.booking.book({ date, passNo });
  log(`${reply.outcome === "booked" ? "✓" : "✗"} ${reply.message}`, reply.outcome === "booked" ? "green" : "red");
}

async function cancelBooking(services: AppServices) {
  const bookingId = args[1];
  if (!bookingId) {
    log("Usage: npx tsx scripts/maintain.ts cancel <bookingId>", "yellow");
    process.exit(1);
  }

  header("Cancel Booking");
  const reply = await services.booking.cancel(bookingId);
  log(`${reply.outcome === "cancelled" ? "✓" : "✗"} ${reply.message}`, reply.outcome === "cancelled" ? "green" : "red");
}

async function checkLogin(services: AppServices) {
  header("Login Check");

  const { username, password } = services.config.portal.credentials;
  const result = await services.auth.login(username, password);

  if (result.ok) {
    const stats = result.session.stats();
    log(`✓ Logged in as ${username}`, "green");
    log(`  ${stats.requests} requests, ${formatBytes(stats.bytes)} received`, "dim");
    return;
  }

  log(`✗ ${result.failure.reason}: ${result.failure.message}`, "red");
  if (result.failure.bodySnippet) {
    log(`  ${result.failure.bodySnippet}`, "dim");
  }
}

function showHelp() {
  console.log(`
${colors.bright}Portal Slot Watcher - Maintenance Utility${colors.reset}

${colors.cyan}Usage:${colors.reset}
  npx tsx scripts/maintain.ts <command> [options]

${colors.cyan}Commands:${colors.reset}
  status                      Show configuration and stored slot counts
  scrape                      Run one sync cycle now (notifications included)
  slots [date] [--free]       Show the stored week containing date (default: today)
  book <date> <passNo>        Book a slot
  cancel <bookingId>          Cancel a booking
  login                       Check the portal credentials

${colors.cyan}Examples:${colors.reset}
  npx tsx scripts/maintain.ts status
  npx tsx scripts/maintain.ts slots 2025-06-02 --free
  npx tsx scripts/maintain.ts book 2025-06-02 3
`);
}

const commands: Record<string, (services: AppServices) => Promise<void>> = {
  status: showStatus,
  scrape: runScrape,
  slots: showSlots,
  book: bookSlot,
  cancel: cancelBooking,
  login: checkLogin,
};

// Main
async function main() {
  const handler = command && Object.hasOwn(commands, command) ? commands[command] : undefined;
  if (!handler) {
    showHelp();
    return;
  }

  const config = loadConfig();
  const services = createServices(config, createLogger({ level: config.logLevel }));
  try {
    await handler(services);
  } finally {
    services.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log("Invalid configuration:", "red");
    for (const issue of err.issues) {
      log(`  ${issue.field}: ${issue.message}`, "red");
    }
  } else {
    log(`Error: ${err instanceof Error ? err.message : String(err)}`, "red");
  }
  process.exit(1);
});
