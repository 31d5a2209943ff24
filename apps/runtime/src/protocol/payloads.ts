/**
 * Typed payload codecs for the built-in message types.
 *
 * Fixed-size kinds (geometry) are read straight from a DataView.
 * Variable-length kinds are length-prefixed and decoded eagerly into owned
 * values. Every decoder throws {@link PayloadDecodeError} on malformed input.
 */

import { BinaryReader, BinaryWriter, PayloadDecodeError } from "./binary.js";

export interface PayloadCodec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

function codec<T>(
  write: (w: BinaryWriter, value: T) => void,
  read: (r: BinaryReader) => T,
): PayloadCodec<T> {
  return {
    encode(value) {
      const writer = new BinaryWriter();
      write(writer, value);
      return writer.finish();
    },
    decode(bytes) {
      const reader = new BinaryReader(bytes);
      const value = read(reader);
      reader.end();
      return value;
    },
  };
}

// ---------------------------------------------------------------------------
// Value types
// ---------------------------------------------------------------------------

export interface Geometry {
  visible: boolean;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Breakpoint {
  file: string;
  line: number;
}

export type Severity = "error" | "warning" | "info" | "hint";

export interface DiagnosticItem {
  line: number;
  column: number;
  severity: Severity;
  message: string;
}

export interface DiagnosticsPayload {
  uri: string;
  items: DiagnosticItem[];
}

export interface EditPayload {
  offset: number;
  deleteCount: number;
  text: string;
}

export type NoticeLevel = "info" | "warning" | "error";

export interface NoticePayload {
  level: NoticeLevel;
  text: string;
}

export interface BatchPayload {
  /** Message type of every item. */
  type: string;
  items: Uint8Array[];
}

// ---------------------------------------------------------------------------
// Enum tables
// ---------------------------------------------------------------------------

const SEVERITIES: readonly Severity[] = ["error", "warning", "info", "hint"];
const NOTICE_LEVELS: readonly NoticeLevel[] = ["info", "warning", "error"];

function readEnum<T>(values: readonly T[], index: number, field: string): T {
  const value = values[index];
  if (value === undefined) {
    throw new PayloadDecodeError(`Invalid ${field} code ${index}`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

const GEOMETRY_LENGTH = 17;

/** Fixed 17-byte layout: visible u8, x i32, y i32, width u32, height u32. */
export const geometryCodec: PayloadCodec<Geometry> = {
  encode(value) {
    const out = new Uint8Array(GEOMETRY_LENGTH);
    const view = new DataView(out.buffer);
    view.setUint8(0, value.visible ? 1 : 0);
    view.setInt32(1, value.x);
    view.setInt32(5, value.y);
    view.setUint32(9, value.width);
    view.setUint32(13, value.height);
    return out;
  },
  decode(bytes) {
    if (bytes.length !== GEOMETRY_LENGTH) {
      throw new PayloadDecodeError(
        `Geometry payload must be ${GEOMETRY_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return {
      visible: view.getUint8(0) !== 0,
      x: view.getInt32(1),
      y: view.getInt32(5),
      width: view.getUint32(9),
      height: view.getUint32(13),
    };
  },
};

export const breakpointCodec = codec<Breakpoint>(
  (w, bp) => w.string(bp.file).u32(bp.line),
  (r) => ({ file: r.string(), line: r.u32() }),
);

export const breakpointListCodec = codec<Breakpoint[]>(
  (w, list) => {
    w.u32(list.length);
    for (const bp of list) w.string(bp.file).u32(bp.line);
  },
  (r) => {
    const count = r.u32();
    const list: Breakpoint[] = [];
    for (let i = 0; i < count; i++) {
      list.push({ file: r.string(), line: r.u32() });
    }
    return list;
  },
);

/** A single UTF-8 string: theme names, session ids, node ids, graph sources. */
export const textCodec = codec<string>(
  (w, text) => w.string(text),
  (r) => r.string(),
);

export const diagnosticsCodec = codec<DiagnosticsPayload>(
  (w, value) => {
    w.string(value.uri).u32(value.items.length);
    for (const item of value.items) {
      w.u32(item.line)
        .u32(item.column)
        .u8(SEVERITIES.indexOf(item.severity))
        .string(item.message);
    }
  },
  (r) => {
    const uri = r.string();
    const count = r.u32();
    const items: DiagnosticItem[] = [];
    for (let i = 0; i < count; i++) {
      const line = r.u32();
      const column = r.u32();
      const severity = readEnum(SEVERITIES, r.u8(), "severity");
      items.push({ line, column, severity, message: r.string() });
    }
    return { uri, items };
  },
);

export const editCodec = codec<EditPayload>(
  (w, edit) => w.u32(edit.offset).u32(edit.deleteCount).string(edit.text),
  (r) => ({ offset: r.u32(), deleteCount: r.u32(), text: r.string() }),
);

export const noticeCodec = codec<NoticePayload>(
  (w, notice) => w.u8(NOTICE_LEVELS.indexOf(notice.level)).string(notice.text),
  (r) => ({ level: readEnum(NOTICE_LEVELS, r.u8(), "notice level"), text: r.string() }),
);

export const batchCodec = codec<BatchPayload>(
  (w, batch) => {
    w.string(batch.type).u32(batch.items.length);
    for (const item of batch.items) w.bytes(item);
  },
  (r) => {
    const type = r.string();
    const count = r.u32();
    const items: Uint8Array[] = [];
    for (let i = 0; i < count; i++) items.push(r.bytes());
    return { type, items };
  },
);
