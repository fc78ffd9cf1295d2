// src/models/contact.types.ts
export interface Contact {
  id: string;
  userId: string;
  name: string;
  phone: string | null;
  email: string | null;
  note: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface ContactStored {
  id: string;
  user_id: string;
  name: string;
  phone: string | null;
  email: string | null;
  note: string | null;
  created_at: number;
  updated_at: number;
}

export type CreateContactInput = Pick<Contact, 'name'> & Partial<Pick<Contact, 'phone' | 'email' | 'note'>>;

export type UpdateContactInput = Partial<Pick<Contact, 'name' | 'phone' | 'email' | 'note'>>;

export interface ContactListQuery {
  skip: number;
  limit: number;
  search?: string;
}

export interface ContactListResponse {
  contacts: Contact[];
  total: number;
}
