/**
 * JSON serialization and atomic writes for inventory and index artifacts
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { OutputFormat } from '../config/schema.js';

function wrap(items: string[], open: string, close: string, indent: string, depth: number): string {
  if (items.length === 0) {
    return open + close;
  }
  if (indent === '') {
    return `${open}${items.join(',')}${close}`;
  }
  const inner = `\n${indent.repeat(depth + 1)}`;
  return `${open}${inner}${items.join(`,${inner}`)}\n${indent.repeat(depth)}${close}`;
}

function encodeMembers(entries: Array<[string, unknown]>, indent: string, depth: number): string {
  const members: string[] = [];
  for (const [key, member] of entries) {
    const encoded = encode(member, indent, depth + 1);
    if (encoded !== undefined) {
      members.push(`${JSON.stringify(key)}:${indent === '' ? '' : ' '}${encoded}`);
    }
  }
  return wrap(members, '{', '}', indent, depth);
}

/**
 * JSON.stringify with Maps written as objects in insertion order.
 * Returns undefined for values JSON has no form for.
 */
function encode(value: unknown, indent: string, depth: number): string | undefined {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return undefined;
  }
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = Array.from(value.entries(), ([key, member]) => [
      String(key),
      member,
    ]);
    return encodeMembers(entries, indent, depth);
  }
  if (Array.isArray(value)) {
    const items = value.map(item => encode(item, indent, depth + 1) ?? 'null');
    return wrap(items, '[', ']', indent, depth);
  }
  if (value !== null && typeof value === 'object') {
    return encodeMembers(Object.entries(value), indent, depth);
  }
  return JSON.stringify(value);
}

/**
 * Pretty output is indented by two spaces and ends with a newline;
 * compact output has no whitespace and no trailing newline.
 */
export function toJsonText(value: unknown, format: OutputFormat): string {
  const text = encode(value, format === 'pretty' ? '  ' : '', 0) ?? 'null';
  return format === 'pretty' ? `${text}\n` : text;
}

/**
 * Write through a temporary file in the target directory, then rename.
 */
export async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  const absolutePath = path.resolve(filePath);
  const dir = path.dirname(absolutePath);
  await fs.promises.mkdir(dir, { recursive: true });

  const tmpPath = path.join(
    dir,
    `.${path.basename(absolutePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await fs.promises.writeFile(tmpPath, text, 'utf-8');
    await fs.promises.rename(tmpPath, absolutePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function writeJson(filePath: string, value: unknown, format: OutputFormat): Promise<void> {
  await writeTextAtomic(filePath, toJsonText(value, format));
}
