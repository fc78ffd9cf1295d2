// src/models/message.types.ts
export const MESSAGE_ROLES = ['user', 'assistant'] as const;

export type MessageRole = typeof MESSAGE_ROLES[number];

export const ATTACHMENT_TYPES = ['image', 'audio'] as const;

export type AttachmentType = typeof ATTACHMENT_TYPES[number];

export interface Attachment {
  id: string;
  type: AttachmentType;
  mimeType: string;
  dataUrl: string;
  name?: string;
  durationMs?: number;
}

export type DraftSnapshot = Record<string, unknown>;

export interface Message {
  id: string;
  userId: string;
  role: MessageRole;
  content: string;
  drafts: DraftSnapshot[] | null;
  attachments: Attachment[] | null;
  createdAt: number;
}

export interface MessageStored {
  id: string;
  user_id: string;
  role: string;
  content: string;
  drafts_json: string | null;
  attachments_json: string | null;
  created_at: number;
}

export interface CreateMessageInput {
  role: MessageRole;
  content: string;
  drafts?: DraftSnapshot[] | null;
  attachments?: Attachment[] | null;
}

export interface UpdateMessageInput {
  content?: string;
  drafts?: DraftSnapshot[] | null;
}

export interface MessageListQuery {
  skip: number;
  limit: number;
}

export interface MessageListResponse {
  messages: Message[];
  total: number;
}
