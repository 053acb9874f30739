export const SQL = {
  schema: {
    createCandles: `
      CREATE TABLE IF NOT EXISTS candles (
        market TEXT    NOT NULL,
        time   INTEGER NOT NULL,
        open   REAL    NOT NULL,
        high   REAL    NOT NULL,
        low    REAL    NOT NULL,
        close  REAL    NOT NULL,
        volume REAL    NOT NULL,
        PRIMARY KEY (market, time)
      )
    `,
  },
  candles: {
    // (market, time) already present → row skipped, never overwritten
    insertOrIgnore: `
      INSERT OR IGNORE INTO candles (market, time, open, high, low, close, volume)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `,
    latestTime: `SELECT MAX(time) AS latest FROM candles WHERE market = ?`,
    countByMarket: `SELECT COUNT(*) AS n FROM candles WHERE market = ?`,
  },
} as const;
