import type { AccountRepository } from "./account-repository";
import type { MarketDataRepository } from "./market-data-repository";
import type { PortfolioHistoryRepository } from "./portfolio-history-repository";
import type { PositionRepository } from "./position-repository";
import type { SignalRepository } from "./signal-repository";
import type { TradeRepository } from "./trade-repository";

/**
 * Every repository bound to the same database (or transaction)
 */
export interface Repositories {
  accounts: AccountRepository;
  trades: TradeRepository;
  positions: PositionRepository;
  marketData: MarketDataRepository;
  signals: SignalRepository;
  portfolioHistory: PortfolioHistoryRepository;
}
