import type { AccountState, TradeRecord, TradeSide } from "@shared/types/journal";

export interface TradeSummary {
  totalTrades: number;
  profitableTrades: number;
  /** Percentage, 0–100. */
  winRate: number;
  totalPnl: number;
  /** P/L of the first five trades in list order; null with fewer than five. */
  recentPnl: number | null;
}

export interface PositionSummary {
  coin: string;
  side: TradeSide;
  size: number;
  unrealizedPnl: number;
}

export interface PortfolioSummary {
  accountValue: number;
  openPositions: number;
  positions: PositionSummary[];
}

export function summarizeTrades(trades: readonly TradeRecord[]): TradeSummary {
  const totalTrades = trades.length;
  const profitableTrades = trades.filter((trade) => trade.pnl > 0).length;
  const totalPnl = trades.reduce((sum, trade) => sum + trade.pnl, 0);

  return {
    totalTrades,
    profitableTrades,
    winRate: totalTrades > 0 ? (profitableTrades / totalTrades) * 100 : 0,
    totalPnl,
    recentPnl: totalTrades >= 5 ? trades.slice(0, 5).reduce((sum, trade) => sum + trade.pnl, 0) : null,
  };
}

export function summarizePortfolio(userState: AccountState | null | undefined): PortfolioSummary {
  const positions = (userState?.assetPositions ?? []).map(({ position }) => ({
    coin: position.coin || "Unknown",
    side: position.szi > 0 ? ("Long" as const) : ("Short" as const),
    size: Math.abs(position.szi),
    unrealizedPnl: position.unrealizedPnl,
  }));

  return {
    accountValue: userState?.marginSummary?.accountValue ?? 0,
    openPositions: positions.length,
    positions,
  };
}
