import type { JournalDocument, ReflectionKey, TagField, TradeRecord } from "@shared/types/journal";
import { formatJournalTime } from "@shared/utils/time";

import { summarizePortfolio } from "./summary";

const PLACEHOLDER = "n/a";

const TAG_LINES: ReadonlyArray<[TagField, string]> = [
  ["emotional_state", "Emotional State"],
  ["triggers", "Triggers"],
  ["mistakes", "Psychological Mistakes"],
  ["corrective_action", "Corrective Action"],
];

const REFLECTION_LINES: ReadonlyArray<[ReflectionKey, string]> = [
  ["patterns", "Recurring Patterns"],
  ["triggers", "Triggers to Avoid"],
  ["adjustments", "Trading Plan Adjustments"],
  ["goals", "Daily/Weekly Goal"],
];

export interface MarkdownOptions {
  now?: Date;
  timeZone?: string;
}

function orPlaceholder(value: string | undefined): string {
  return value && value.trim() ? value : PLACEHOLDER;
}

function money(value: number): string {
  return value.toFixed(2);
}

function tradeSection(trade: TradeRecord, timeZone: string): string[] {
  const lines = [
    `### Trade: ${trade.coin} (${trade.side}) (ID: ${trade.id})`,
    `- **Source**: ${trade.type}`,
    `- **Asset Pair**: ${trade.coin}/USD`,
    `- **Position Type**: ${trade.side}`,
    `- **Position Size**: ${trade.size.toFixed(4)} ${trade.coin}`,
    `- **Entry Price**: $${money(trade.price)}`,
    `- **Entry Time**: ${trade.time} ${timeZone}`,
  ];
  if (trade.leverage !== undefined) {
    lines.push(`- **Leverage**: ${trade.leverage}x`);
  }
  lines.push(`- **Profit/Loss**: $${money(trade.pnl)}`, `- **Fees Paid**: ${money(trade.fee)} USDC`);
  for (const [field, label] of TAG_LINES) {
    lines.push(`- **${label}**: ${orPlaceholder(trade[field])}`);
  }
  lines.push(`- **Last Edited**: ${orPlaceholder(trade.last_edited)}`, "");
  return lines;
}

/** Renders the whole journal as a markdown document, newest trades first. */
export function generateMarkdownJournal(document: JournalDocument, options: MarkdownOptions = {}): string {
  const timeZone = options.timeZone ?? "UTC";
  const now = options.now ?? new Date();

  const trades = [...document.trades, ...document.manual_trades].sort((a, b) =>
    a.time < b.time ? 1 : a.time > b.time ? -1 : 0,
  );

  const lines: string[] = [
    "# Emotional Trading Journal",
    "",
    `Generated on: ${formatJournalTime(now, timeZone)} ${timeZone}`,
    "",
    "Track your trades and emotions to identify fear, greed, and FOMO patterns.",
    "",
    "## Recent Trades",
    "",
  ];

  if (trades.length === 0) {
    lines.push("No trades recorded.", "");
  }
  for (const trade of trades) {
    lines.push(...tradeSection(trade, timeZone));
  }

  lines.push("## Emotional Reflection");
  for (const [key, label] of REFLECTION_LINES) {
    lines.push(`- **${label}**: ${orPlaceholder(document.reflections[key])}`);
  }

  const portfolio = summarizePortfolio(document.user_state);
  const positions = portfolio.positions.length
    ? portfolio.positions.map((p) => `${p.size.toFixed(4)} ${p.coin} ${p.side}`).join(", ")
    : "None";
  lines.push(
    "",
    "## Portfolio Snapshot",
    `- **Account Equity**: $${money(portfolio.accountValue)} USDC`,
    `- **Open Positions**: ${positions}`,
    "",
  );

  return lines.join("\n");
}
