export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS report_packages (
  package_id TEXT PRIMARY KEY,
  schema_version INTEGER NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('complete', 'partial')),
  failed_stage TEXT,
  created_at TIMESTAMPTZ NOT NULL,
  document JSONB NOT NULL,
  archived_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS package_confirmations (
  package_id TEXT NOT NULL REFERENCES report_packages(package_id),
  sequence INTEGER NOT NULL CHECK (sequence >= 1),
  entry_id TEXT NOT NULL UNIQUE,
  section TEXT NOT NULL,
  acknowledged BOOLEAN NOT NULL,
  comment TEXT,
  recorded_at TIMESTAMPTZ NOT NULL,
  PRIMARY KEY (package_id, sequence)
);

CREATE INDEX IF NOT EXISTS idx_report_packages_created_at ON report_packages(created_at DESC);

CREATE OR REPLACE FUNCTION reject_archive_rewrite() RETURNS trigger AS $$
BEGIN
  RAISE EXCEPTION 'archived rows are append-only (% on %)', TG_OP, TG_TABLE_NAME;
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS report_packages_append_only ON report_packages;
CREATE TRIGGER report_packages_append_only
  BEFORE UPDATE OR DELETE ON report_packages
  FOR EACH ROW EXECUTE FUNCTION reject_archive_rewrite();

DROP TRIGGER IF EXISTS package_confirmations_append_only ON package_confirmations;
CREATE TRIGGER package_confirmations_append_only
  BEFORE UPDATE OR DELETE ON package_confirmations
  FOR EACH ROW EXECUTE FUNCTION reject_archive_rewrite();
`;
