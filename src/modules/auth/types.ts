export type UserRow = {
  id: number;
  email: string;
  hashed_password: string;
  default_company_name: string | null;
  default_document_type: string;
  default_submission_date: string | null; // YYYY-MM-DD
  is_active: boolean;
};

/** What request handlers see once a bearer token has been resolved. */
export type AuthUser = Omit<UserRow, "hashed_password">;

export type NewUser = {
  email: string;
  hashed_password: string;
  default_company_name?: string | null;
  default_document_type?: string | null;
  default_submission_date?: string | null;
};
