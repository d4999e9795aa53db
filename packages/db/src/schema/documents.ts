import { pgTable, text, timestamp, integer, pgEnum, customType, index } from "drizzle-orm/pg-core";

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

export const documentProcessingStatusEnum = pgEnum("document_processing_status", [
  "pending",
  "processing",
  "completed",
  "failed",
]);

/**
 * Uploaded knowledge-base documents. Only the columns the ingestion worker
 * reads or writes back are modelled here.
 */
export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenantId: text("tenant_id").notNull(),
    filename: text("filename").notNull(),
    mimeType: text("mime_type").notNull().default("text/plain"),
    content: bytea("content"),
    extractedText: text("extracted_text"),
    processingStatus: documentProcessingStatusEnum("processing_status").notNull().default("pending"),
    wordCount: integer("word_count"),
    chunkCount: integer("chunk_count"),
    processingError: text("processing_error"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tenantIdx: index("documents_tenant_idx").on(table.tenantId),
  }),
);

export type DocumentRow = typeof documents.$inferSelect;
