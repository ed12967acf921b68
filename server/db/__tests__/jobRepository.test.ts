import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { mapJobRow } from "../jobRepository";

const baseRow = {
  job_id: "job-1",
  owner_id: "owner-1",
  source_lang: "en",
  target_lang: "tr",
  status: "translating",
  file_name: "report.pdf",
  file_size: "2048",
  page_count: 2,
  pages_processed: 2,
  source_ref: "job-1/source.pdf",
  artifact_ref: null,
  error: null,
  warnings: [
    { code: "ocr_failed", pageIndex: 1, message: "OCR found no usable text on page 2 (no usable text spans)" },
  ],
  failed_block_count: 0,
  clipped_block_count: 0,
  credits_charged: 2,
  cancel_requested: false,
  run_token: null,
  lease_expires_at: null,
  created_at: new Date("2026-03-02T09:00:00.000Z"),
  updated_at: new Date("2026-03-02T09:01:00.000Z"),
  expires_at: new Date("2026-03-03T09:00:00.000Z"),
  completed_at: null,
  cleaned_at: null,
};

describe("mapJobRow", () => {
  test("converts column types and parses JSON columns", () => {
    const job = mapJobRow(baseRow);
    assert.equal(job.fileSize, 2048);
    assert.equal(job.status, "translating");
    assert.deepEqual(job.warnings, [
      { code: "ocr_failed", pageIndex: 1, message: "OCR found no usable text on page 2 (no usable text spans)" },
    ]);
  });

  test("maps unknown error codes to internal_error", () => {
    const job = mapJobRow({
      ...baseRow,
      status: "failed",
      error: { code: "disk_full", message: "no space left" },
    });
    assert.deepEqual(job.error, { code: "internal_error", message: "no space left" });
  });

  test("drops malformed warnings and rejects unknown statuses", () => {
    assert.deepEqual(mapJobRow({ ...baseRow, warnings: [{ code: "nope" }] }).warnings, []);
    assert.throws(() => mapJobRow({ ...baseRow, status: "paused" }), /unknown status/);
  });
});
