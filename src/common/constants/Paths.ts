/**
 * Express route paths. Everything below `Base` is mounted under /api.
 */
export default {
  Base: '/api',
  Health: {
    Base: '/health',
    Llm: '/llm',
  },
  Validation: {
    Base: '/validation',
    MasterPreview: '/master/preview',
    Runs: '/runs',
    Run: '/runs/:runId',
    Table: '/runs/:runId/table',
    Report: '/runs/:runId/report',
  },
} as const;
