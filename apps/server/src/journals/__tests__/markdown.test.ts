import { describe, it, expect } from "vitest";

import type { JournalDocument } from "@shared/types/journal";

import { generateMarkdownJournal } from "../markdown";

const NOW = new Date("2024-03-07T12:00:00Z");

const HEADER = [
  "# Emotional Trading Journal",
  "",
  "Generated on: 2024-03-07 12:00:00 UTC",
  "",
  "Track your trades and emotions to identify fear, greed, and FOMO patterns.",
  "",
  "## Recent Trades",
  "",
];

describe("generateMarkdownJournal", () => {
  it("renders trades newest first with reflections and portfolio", () => {
    const document: JournalDocument = {
      trades: [
        {
          id: "1",
          coin: "BTC",
          side: "Long",
          size: 0.5,
          price: 60000,
          pnl: 25.5,
          fee: 1.2,
          time: "2024-03-05 10:00:00",
          type: "API Trade",
          emotional_state: "Greed",
          last_edited: "2024-03-05 11:00:00",
        },
      ],
      manual_trades: [
        {
          id: "manual-x",
          coin: "ETH",
          side: "Short",
          size: 2,
          price: 3000,
          pnl: -15,
          fee: 0,
          time: "2024-03-06 09:00:00",
          leverage: 3,
          type: "Manual Trade",
        },
      ],
      reflections: { goals: "Rest" },
      user_state: {
        marginSummary: { accountValue: 1500 },
        assetPositions: [{ position: { coin: "BTC", szi: -0.25, unrealizedPnl: 3 } }],
      },
    };

    expect(generateMarkdownJournal(document, { now: NOW }).split("\n")).toEqual([
      ...HEADER,
      "### Trade: ETH (Short) (ID: manual-x)",
      "- **Source**: Manual Trade",
      "- **Asset Pair**: ETH/USD",
      "- **Position Type**: Short",
      "- **Position Size**: 2.0000 ETH",
      "- **Entry Price**: $3000.00",
      "- **Entry Time**: 2024-03-06 09:00:00 UTC",
      "- **Leverage**: 3x",
      "- **Profit/Loss**: $-15.00",
      "- **Fees Paid**: 0.00 USDC",
      "- **Emotional State**: n/a",
      "- **Triggers**: n/a",
      "- **Psychological Mistakes**: n/a",
      "- **Corrective Action**: n/a",
      "- **Last Edited**: n/a",
      "",
      "### Trade: BTC (Long) (ID: 1)",
      "- **Source**: API Trade",
      "- **Asset Pair**: BTC/USD",
      "- **Position Type**: Long",
      "- **Position Size**: 0.5000 BTC",
      "- **Entry Price**: $60000.00",
      "- **Entry Time**: 2024-03-05 10:00:00 UTC",
      "- **Profit/Loss**: $25.50",
      "- **Fees Paid**: 1.20 USDC",
      "- **Emotional State**: Greed",
      "- **Triggers**: n/a",
      "- **Psychological Mistakes**: n/a",
      "- **Corrective Action**: n/a",
      "- **Last Edited**: 2024-03-05 11:00:00",
      "",
      "## Emotional Reflection",
      "- **Recurring Patterns**: n/a",
      "- **Triggers to Avoid**: n/a",
      "- **Trading Plan Adjustments**: n/a",
      "- **Daily/Weekly Goal**: Rest",
      "",
      "## Portfolio Snapshot",
      "- **Account Equity**: $1500.00 USDC",
      "- **Open Positions**: 0.2500 BTC Short",
      "",
    ]);
  });

  it("renders an empty journal", () => {
    const markdown = generateMarkdownJournal(
      { trades: [], manual_trades: [], reflections: {} },
      { now: NOW },
    );

    expect(markdown.split("\n")).toEqual([
      ...HEADER,
      "No trades recorded.",
      "",
      "## Emotional Reflection",
      "- **Recurring Patterns**: n/a",
      "- **Triggers to Avoid**: n/a",
      "- **Trading Plan Adjustments**: n/a",
      "- **Daily/Weekly Goal**: n/a",
      "",
      "## Portfolio Snapshot",
      "- **Account Equity**: $0.00 USDC",
      "- **Open Positions**: None",
      "",
    ]);
  });

  it("stamps the generation time in the journal zone", () => {
    const markdown = generateMarkdownJournal(
      { trades: [], manual_trades: [], reflections: {} },
      { now: NOW, timeZone: "Asia/Tokyo" },
    );
    expect(markdown.split("\n")[2]).toBe("Generated on: 2024-03-07 21:00:00 Asia/Tokyo");
  });
});
