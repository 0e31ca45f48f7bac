export * from "./equity";
export * from "./drawdown";
export * from "./statistics";
export * from "./ratios";
export * from "./win-loss";
export * from "./summary";
export * from "./analysis";
export * from "./leaderboard";
