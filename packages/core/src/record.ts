import type { InvoiceRecord, KnownEntityTable, ParsedField, ParseResult } from "./types";
import { findKnownEntityByName } from "./extract/knownEntities";

export interface BuildRecordOptions {
  knownEntities?: KnownEntityTable;
  vendorCode?: string;
}

function fieldValue(field: ParsedField | null, fallback = ""): string {
  return field?.value ? field.value.trim() : fallback;
}

function metaString(meta: Record<string, unknown> | undefined, key: string): string {
  const v = meta?.[key];
  return typeof v === "string" || typeof v === "number" ? String(v).trim() : "";
}

// Flattens a parse result into the row shape downstream exporters consume.
export function buildInvoiceRecord(parse: ParseResult, opts: BuildRecordOptions = {}): InvoiceRecord {
  const vendor = parse.vendor && opts.knownEntities
    ? findKnownEntityByName(parse.vendor.value, opts.knownEntities)
    : undefined;
  const vendorCode = opts.vendorCode?.trim() || metaString(vendor?.metadata, "code");

  return {
    invoiceDate: fieldValue(parse.invoiceDate),
    invoiceNumber: fieldValue(parse.invoiceId),
    address: metaString(vendor?.metadata, "address"),
    description: parse.lineItems[0]?.description.trim() ?? "",
    amount: fieldValue(parse.total),
    vendorCode: vendorCode || "UNKNOWN",
  };
}

export function toTsv(record: InvoiceRecord): string {
  return [
    record.invoiceDate,
    record.invoiceNumber,
    record.address,
    record.description,
    record.amount,
    record.vendorCode,
  ].join("\t");
}
