/** Minimal interface for a DNS provider adapter bound to a single record */
export interface DnsRecordProvider {
  /** Read the record's current content (the published IP) */
  getRecordContent(): Promise<string>;
  /** Replace the record's content */
  updateRecordContent(content: string): Promise<void>;
}
