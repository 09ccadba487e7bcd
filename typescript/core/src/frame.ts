import { inflate } from 'pako';
import { z } from 'zod';
import { ValidationError } from './types';

export type FrameMode = 'state' | 'append' | 'list';
export type FrameOp = 'create' | 'upsert' | 'patch' | 'delete' | 'snapshot';
export type SortOrder = 'asc' | 'desc';

export interface SortConfig {
  field: string[];
  order: SortOrder;
}

export interface EntityFrame<T = unknown> {
  mode: FrameMode;
  entity: string;
  op: 'create' | 'upsert' | 'patch' | 'delete';
  key: string;
  data?: T;
  /** Dotted field paths whose arrays are concatenated instead of replaced on patch */
  append?: string[];
}

export interface SnapshotEntity<T = unknown> {
  key: string;
  data?: T;
}

export interface SnapshotFrame<T = unknown> {
  mode: FrameMode;
  entity: string;
  op: 'snapshot';
  data: SnapshotEntity<T>[];
  /** Set on state-view snapshots; an empty `data` then confirms the key is absent. */
  key?: string;
  /** `false` on every batch but the last */
  complete?: boolean;
}

export interface SubscribedFrame {
  op: 'subscribed';
  view: string;
  mode: FrameMode;
  sort?: SortConfig;
}

export interface ErrorFrame {
  op: 'error';
  view: string;
  key?: string;
  message: string;
}

export type Frame<T = unknown> = EntityFrame<T> | SnapshotFrame<T> | SubscribedFrame | ErrorFrame;

const FrameModeSchema = z.enum(['state', 'append', 'list']);

const EntityFrameSchema = z.object({
  mode: FrameModeSchema,
  entity: z.string(),
  op: z.enum(['create', 'upsert', 'patch', 'delete']),
  key: z.string(),
  data: z.unknown(),
  append: z.array(z.string()).optional(),
});

const SnapshotFrameSchema = z.object({
  mode: FrameModeSchema,
  entity: z.string(),
  op: z.literal('snapshot'),
  data: z.array(z.object({ key: z.string(), data: z.unknown() })),
  key: z.string().optional(),
  complete: z.boolean().optional(),
});

const SubscribedFrameSchema = z.object({
  op: z.literal('subscribed'),
  view: z.string(),
  mode: FrameModeSchema,
  sort: z
    .object({
      field: z.array(z.string()),
      order: z.enum(['asc', 'desc']),
    })
    .optional(),
});

const ErrorFrameSchema = z.object({
  op: z.literal('error'),
  view: z.string(),
  key: z.string().optional(),
  message: z.string(),
});

export const FrameSchema = z.union([
  EntityFrameSchema,
  SnapshotFrameSchema,
  SubscribedFrameSchema,
  ErrorFrameSchema,
]);

const CompressedFrameSchema = z.object({
  compressed: z.literal('gzip'),
  data: z.string(),
});

function decompressGzip(base64Data: string): string {
  const binaryString = atob(base64Data);
  const bytes = new Uint8Array(binaryString.length);
  for (let i = 0; i < binaryString.length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }
  const decompressed = inflate(bytes);
  return new TextDecoder().decode(decompressed);
}

function parseAndDecompress(jsonString: string): Frame {
  let parsed: unknown = JSON.parse(jsonString);

  const compressed = CompressedFrameSchema.safeParse(parsed);
  if (compressed.success) {
    parsed = JSON.parse(decompressGzip(compressed.data.data));
  }

  if (!isValidFrame(parsed)) {
    throw new ValidationError('Malformed frame', FrameSchema.safeParse(parsed).error);
  }
  return parsed;
}

export function isValidFrame(frame: unknown): frame is Frame {
  return FrameSchema.safeParse(frame).success;
}

export function isSnapshotFrame<T>(frame: Frame<T>): frame is SnapshotFrame<T> {
  return frame.op === 'snapshot';
}

export function isSubscribedFrame<T>(frame: Frame<T>): frame is SubscribedFrame {
  return frame.op === 'subscribed';
}

export function isErrorFrame<T>(frame: Frame<T>): frame is ErrorFrame {
  return frame.op === 'error';
}

export function isEntityFrame<T>(frame: Frame<T>): frame is EntityFrame<T> {
  return !isSnapshotFrame(frame) && !isSubscribedFrame(frame) && !isErrorFrame(frame);
}

/** The view path a frame applies to. */
export function frameView(frame: Frame): string {
  return isSubscribedFrame(frame) || isErrorFrame(frame) ? frame.view : frame.entity;
}

/**
 * Decodes a text or binary message into a frame, inflating gzip-wrapped payloads.
 * Throws `SyntaxError` on invalid JSON and `ValidationError` on a malformed frame.
 */
export function parseFrame(data: ArrayBuffer | Uint8Array | string): Frame {
  if (typeof data === 'string') {
    return parseAndDecompress(data);
  }

  const decoder = new TextDecoder('utf-8');
  return parseAndDecompress(decoder.decode(data));
}
