// src/types/data.ts
export type DirectoryEntry = {
  department: string;
  group: string;
  secret: string;           // compared as-is; never sent to clients
};

export type Identity = {
  department: string;
  group: string;
};

export type MeetingRecord = {
  id: string;               // random UUID, assigned at commit
  submittedAt: string;      // "YYYY-MM-DD HH:MM:SS", local time
  meetingDate: string;      // "YYYY-MM-DD"
  department: string;
  group: string;
  content: string;
  attachmentUrl: string;    // '' when there was no attachment or the upload failed
};

export type Attachment = {
  bytes: Uint8Array;
  filename: string;
  mimeType: string;
};

export type CartItem = {
  content: string;
  attachment?: Attachment;
  stagedAt: number;
};

export type CacheSnapshot = {
  directory: DirectoryEntry[];
  records: MeetingRecord[];
  fetchedAt: number;
};
