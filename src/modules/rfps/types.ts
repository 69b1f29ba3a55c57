export type RfpRow = {
  id: number;
  title: string;
  original_filename: string;
  storage_key: string;
  file_sha256: string;
  file_size_bytes: number;
  draft_text: string | null;
  company_name: string | null;
  document_type: string | null;
  submission_date: string | null; // YYYY-MM-DD
  user_id: number;
};

export type NewRfp = Pick<
  RfpRow,
  | "title"
  | "original_filename"
  | "storage_key"
  | "file_sha256"
  | "file_size_bytes"
  | "company_name"
  | "document_type"
  | "submission_date"
  | "user_id"
>;

export type RfpUpdate = {
  draft_text: string;
  company_name: string;
  document_type: string;
  submission_date: string;
};

/** Shape returned by GET /rfp/:id and each item of GET /rfps. */
export type RfpDetail = {
  id: number;
  title: string;
  filename: string;
  draft_text: string | null;
  company_name: string | null;
  document_type: string | null;
  submission_date: string | null;
};

export type RfpSummary = RfpDetail;

export type GeneratedDraft = {
  rfp_id: number;
  title: string;
  draft: string;
};
