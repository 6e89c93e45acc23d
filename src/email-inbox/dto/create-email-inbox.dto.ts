/**
 * Create Email Inbox DTO
 * One inbound email as posted to POST /email-inbox. Field names match the email_inbox columns.
 */

import { IsEmail, IsInt, IsObject, IsOptional, IsString } from 'class-validator';

export class CreateEmailInboxDto {
  @IsString()
  @IsOptional()
  message_id?: string | null;

  @IsString()
  @IsOptional()
  internet_message_id?: string | null;

  @IsString()
  @IsOptional()
  from_name?: string | null;

  @IsEmail()
  from_email!: string;

  @IsEmail()
  to_email!: string;

  @IsString()
  @IsOptional()
  subject?: string | null;

  @IsString()
  @IsOptional()
  body_preview?: string | null;

  @IsString()
  @IsOptional()
  body_html?: string | null;

  @IsString()
  @IsOptional()
  received_at?: string | null; // ISO-8601, cast by the database

  @IsString()
  @IsOptional()
  channel?: string | null = 'email';

  @IsString()
  @IsOptional()
  processing_status?: string | null = 'new';

  @IsInt()
  @IsOptional()
  linked_case_id?: number | null;

  @IsObject()
  @IsOptional()
  raw_payload?: Record<string, unknown> | null;
}
