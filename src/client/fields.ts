/**
 * 动态字段的读取与类型化
 */

import type { FieldDefinition, FieldValue } from '../types/item.js';

/**
 * 按字段名读取，先精确匹配，再忽略大小写匹配
 *
 * `priority` 可以匹配到 `Priority`、`PRIORITY`。
 */
export function findKey(record: Record<string, unknown>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(record, name)) {
    return name;
  }
  const lower = name.toLowerCase();
  return Object.keys(record).find((key) => key.toLowerCase() === lower);
}

export function readField(record: Record<string, unknown>, name: string): unknown {
  const key = findKey(record, name);
  return key === undefined ? undefined : record[key];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').map((v) => v.trim()).filter(Boolean);
  }
  if (typeof value === 'string') {
    return value.split(/[,/|]/).map((v) => v.trim()).filter(Boolean);
  }
  return [];
}

/**
 * 解析类型条目的 Fields 字段
 *
 * 接受两种形式：
 * - 字符串数组：`["title", "status"]`
 * - 对象数组：`[{ "Name": "status", "Type": "options", "Options": ["todo", "done"] }]`
 * 对象的键名不区分大小写，无法识别的元素被跳过。
 */
export function parseFieldDefinitions(raw: unknown): FieldDefinition[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const definitions: FieldDefinition[] = [];
  for (const entry of raw) {
    if (typeof entry === 'string' && entry.trim()) {
      definitions.push({ name: entry.trim(), kind: 'text', options: [], required: false });
      continue;
    }
    if (!isRecord(entry)) continue;

    const name = readField(entry, 'name');
    if (typeof name !== 'string' || !name.trim()) continue;

    const kind = readField(entry, 'type') ?? readField(entry, 'kind');
    definitions.push({
      name: name.trim(),
      kind: typeof kind === 'string' && kind.trim() ? kind.trim() : 'text',
      options: toStringList(readField(entry, 'options')),
      required: readField(entry, 'required') === true,
    });
  }
  return definitions;
}

function parseDate(raw: string | number): FieldValue | undefined {
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) return undefined;
  return { kind: 'datetime', value: date, raw: String(raw) };
}

/**
 * 把原始 JSON 值转换为带标签的字段值
 *
 * 提供字段定义时按声明的种类解释（options → enum，datetime → Date，reference → id），
 * 否则按 JSON 类型推断。值与声明不符时退回推断结果。
 */
export function toFieldValue(raw: unknown, definition?: FieldDefinition): FieldValue {
  if (raw === null || raw === undefined || raw === '') {
    return { kind: 'empty' };
  }
  if (Array.isArray(raw)) {
    return { kind: 'list', values: raw.map((value) => toFieldValue(value, definition)) };
  }

  if (definition) {
    switch (definition.kind) {
      case 'options':
        if (typeof raw === 'string') {
          return { kind: 'enum', value: raw, options: definition.options };
        }
        break;
      case 'reference':
        if (typeof raw === 'string') {
          return { kind: 'reference', id: raw };
        }
        if (isRecord(raw) && typeof raw['ID'] === 'string') {
          return { kind: 'reference', id: raw['ID'] };
        }
        break;
      case 'datetime':
        if (typeof raw === 'string' || typeof raw === 'number') {
          const parsed = parseDate(raw);
          if (parsed) return parsed;
        }
        break;
      case 'number':
        if (typeof raw === 'string' && raw.trim() !== '' && Number.isFinite(Number(raw))) {
          return { kind: 'number', value: Number(raw) };
        }
        break;
      case 'boolean':
        if (raw === 'true' || raw === 'false') {
          return { kind: 'boolean', value: raw === 'true' };
        }
        break;
    }
  }

  switch (typeof raw) {
    case 'string':
      return { kind: 'text', value: raw };
    case 'number':
      return { kind: 'number', value: raw };
    case 'boolean':
      return { kind: 'boolean', value: raw };
    default:
      return isRecord(raw) ? { kind: 'object', value: raw } : { kind: 'text', value: String(raw) };
  }
}
