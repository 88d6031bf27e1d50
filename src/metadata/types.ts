import type {
  Audio,
  Document,
  PhotoSize,
  Sticker,
  Video,
  VideoNote,
  Voice,
} from '../telegram/types.js'

export const MESSAGE_TYPES = [
  'text',
  'photo',
  'video',
  'document',
  'audio',
  'voice',
  'video_note',
  'sticker',
] as const

export type MessageType = (typeof MESSAGE_TYPES)[number]

/** Produced once by classifyMessage(); everything downstream switches on `type`. */
export type ClassifiedMessage =
  | { type: 'photo'; photo: PhotoSize[] }
  | { type: 'video'; video: Video }
  | { type: 'document'; document: Document }
  | { type: 'audio'; audio: Audio }
  | { type: 'voice'; voice: Voice }
  | { type: 'video_note'; videoNote: VideoNote }
  | { type: 'sticker'; sticker: Sticker }
  | { type: 'text' }

export interface FileDescriptor {
  fileId: string | null
  fileName: string | null
  mimeType: string | null
  fileSize: number | null
  duration: number | null
}

export interface Provenance {
  forwardedDate: Date | null
  forwardedFrom: string | null
}

export interface ExtractedMetadata {
  type: MessageType
  textPreview: string | null
  captionPreview: string | null
  file: FileDescriptor
  provenance: Provenance
  urls: string[]
  hashtags: string[]
  mentions: string[]
}
