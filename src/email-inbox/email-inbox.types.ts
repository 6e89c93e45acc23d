import { SqlRow } from '../../shared/database/connection.provider';

/** A row of email_inbox as returned by RETURNING * / SELECT *. */
export interface EmailInboxRow extends SqlRow {
  email_id: number;
  message_id: string | null;
  internet_message_id: string | null;
  from_name: string | null;
  from_email: string;
  to_email: string;
  subject: string | null;
  body_preview: string | null;
  body_html: string | null;
  received_at: Date | string | null;
  channel: string | null;
  processing_status: string | null;
  linked_case_id: number | null;
  raw_payload: unknown;
}
