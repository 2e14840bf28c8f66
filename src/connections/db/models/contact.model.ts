// Contact Model - Based on migration 20260101_000003_create_contacts_table

export interface ContactRow {
  id: string; // UUID
  user_id: string; // owner
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  birth_date: string; // YYYY-MM-DD, DATE parser returns the raw string
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

/** Serialized shape returned by the API and held in the cache */
export interface Contact extends Omit<ContactRow, 'created_at' | 'updated_at'> {
  created_at: string;
  updated_at: string;
}

export interface CreateContactInput {
  first_name: string;
  last_name: string;
  email: string;
  phone?: string | null;
  birth_date: string;
  notes?: string | null;
}

export type UpdateContactInput = Partial<CreateContactInput>;

export const toContact = (row: ContactRow): Contact => ({
  ...row,
  created_at: row.created_at.toISOString(),
  updated_at: row.updated_at.toISOString(),
});
