export const DOCUMENTS_SCHEMA = `
CREATE TABLE IF NOT EXISTS documents (
  id                  SERIAL PRIMARY KEY,
  filename            TEXT NOT NULL,
  content_text        TEXT,
  predicted_category  TEXT,
  confidence_score    DOUBLE PRECISION,
  all_scores          JSONB,
  is_classified       BOOLEAN NOT NULL DEFAULT FALSE,
  classification_time TIMESTAMPTZ,
  inference_time      DOUBLE PRECISION,
  created_at          TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at          TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS documents_recent_idx ON documents (updated_at DESC, created_at DESC);
`
