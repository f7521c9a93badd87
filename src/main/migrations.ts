export interface Migration {
  name: string;
  sql: string;
}

export function getMigrations(): Migration[] {
  return [
    {
      name: '001_create_release_events',
      sql: `
        CREATE TABLE IF NOT EXISTS release_events (
          id TEXT PRIMARY KEY,
          branch TEXT NOT NULL,
          category TEXT NOT NULL,
          severity TEXT NOT NULL DEFAULT 'info',
          message TEXT NOT NULL,
          data TEXT NOT NULL DEFAULT '{}',
          created_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_release_events_branch ON release_events(branch);
        CREATE INDEX IF NOT EXISTS idx_release_events_created_at ON release_events(created_at)
      `,
    },
  ];
}
