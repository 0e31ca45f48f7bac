/** Two trades exported as entry/exit row pairs. */
export const pairedExportCsv = [
  "Trade #,Type,Signal,Date/Time,Price USD,Contracts,Profit USD,Profit %,Cum. Profit USD,Run-up USD,Drawdown USD",
  "1,Entry Long,Long,2024-01-02 09:30,4700.25,2,,,,,",
  '1,Exit Long,Close,2024-01-02 15:45,4712.50,2,"1,225.00",0.26,1225,1500,-200',
  "2,Entry Short,Short,2024-01-03 10:00,4720,1,,,,,",
  "2,Exit Short,Close,2024-01-03 11:00,4730,1,(500.00),-0.2,725,100,-600",
].join("\n");

export const canonicalJson = JSON.stringify({
  trades: [
    {
      exitTime: 1_704_200_000_000,
      symbol: "NQH4",
      entryPrice: 16800,
      exitPrice: 16850,
      size: 1,
      profitLoss: 1000,
    },
  ],
});
