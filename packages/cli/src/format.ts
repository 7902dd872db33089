/**
 * Terminal rendering: chalk for emphasis, cli-table3 for tables.
 *
 * Every helper takes the chalk instance so tests can render without color.
 */

import Table from "cli-table3";
import type { ChalkInstance } from "chalk";
import type { Listing, TransactionRecord } from "@linkvault/types";
import { formatMinorUnits } from "@linkvault/ledger";

export function ok(style: ChalkInstance, msg: string): string {
  return style.green("✓ ") + msg;
}

export function warn(style: ChalkInstance, msg: string): string {
  return style.yellow("! ") + msg;
}

export function info(style: ChalkInstance, label: string, value: string): string {
  return `  ${style.gray(label.padEnd(16))}${value}`;
}

export function money(amount: number): string {
  return formatMinorUnits(amount);
}

function renderTable(
  style: ChalkInstance,
  head: readonly string[],
  rows: readonly (readonly string[])[],
): string {
  const t = new Table({
    head: head.map((h) => style.cyan(h)),
    style: { head: [], border: [] },
  });
  // push is typed over a union of row shapes; these rows are horizontal
  for (const row of rows) {
    Array.prototype.push.call(t, [...row]);
  }
  return t.toString();
}

/** Two-column table of a flat object's fields. */
export function fieldsTable(style: ChalkInstance, data: Readonly<Record<string, unknown>>): string {
  return renderTable(
    style,
    ["Field", "Value"],
    Object.entries(data).map(([key, value]) => [
      key,
      typeof value === "string" ? value : JSON.stringify(value),
    ]),
  );
}

export function listingsTable(style: ChalkInstance, listings: readonly Listing[]): string {
  return renderTable(
    style,
    ["Listing", "Source", "DR", "Topic", "Price"],
    listings.map((l) => [l.listingId, l.sourceUrl, String(l.domainRating), l.topic, money(l.price)]),
  );
}

export function historyTable(style: ChalkInstance, records: readonly TransactionRecord[]): string {
  return renderTable(
    style,
    ["Key", "Kind", "Amount", "Status", "Created", "Reference"],
    records.map((r) => [
      r.idempotencyKey,
      r.kind,
      money(r.amount),
      statusLabel(style, r.status),
      r.createdAt,
      r.remoteReference ?? "-",
    ]),
  );
}

export function statusLabel(style: ChalkInstance, status: TransactionRecord["status"]): string {
  switch (status) {
    case "confirmed":
      return style.green(status);
    case "pending":
    case "reserved":
      return style.yellow(status);
    case "failed":
    case "rolled_back":
      return style.red(status);
  }
}
