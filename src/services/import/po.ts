/**
 * Gettext catalog codec
 *
 * Decoding projects a .po file into a readable text layout: an optional
 * METADATA block, STATISTICS, then one block per entry introduced by a line
 * of 80 dashes. The translator keeps the labels, so encoding can read the
 * blocks back and write each translation onto the original entry matched
 * by (context, msgid).
 */

import { DecodeError } from '../../engine/errors.js';
import type {
  CatalogFilter,
  DocumentCodec,
  DocumentOf,
  EncodedArtifact,
  PoEntry,
} from './types.js';

export const ENTRY_SEPARATOR = '-'.repeat(80);
const SECTION_RULE = '='.repeat(80);
const NOT_TRANSLATED = '(not translated)';
const CONTEXT_GLUE = '\u0004';

export const DEFAULT_CATALOG_FILTER: CatalogFilter = {
  includeUntranslated: true,
  includeFuzzy: true,
  includeObsolete: false,
  includeMetadata: true,
  includeComments: false,
};

type Field = 'msgctxt' | 'msgid' | 'msgid_plural' | 'msgstr' | number;

function createEntry(): PoEntry {
  return {
    msgid: '',
    msgstr: '',
    comments: [],
    extractedComments: [],
    references: [],
    flags: [],
    obsolete: false,
  };
}

export function isTranslated(entry: PoEntry): boolean {
  if (entry.msgstrPlural && entry.msgstrPlural.length > 0) {
    return entry.msgstrPlural.some((text) => text.trim().length > 0);
  }
  return entry.msgstr.trim().length > 0;
}

export function isFuzzy(entry: PoEntry): boolean {
  return entry.flags.includes('fuzzy');
}

function isHeader(entry: PoEntry): boolean {
  return entry.msgid === '' && entry.msgctxt === undefined && !entry.obsolete;
}

// ============================================
// Parsing
// ============================================

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\' };

export function unescapePo(value: string): string {
  return value.replace(/\\(.)/g, (match, char: string) => ESCAPES[char] ?? match);
}

export function escapePo(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
}

function quoted(line: string): string | null {
  const match = /^"(.*)"\s*$/.exec(line);
  return match ? unescapePo(match[1]) : null;
}

/**
 * Parse .po source into entries, header first if present
 */
export function parsePo(content: string): PoEntry[] {
  const entries: PoEntry[] = [];
  let entry = createEntry();
  let field: Field | null = null;
  let hasMsgid = false;

  const flush = () => {
    if (hasMsgid) {
      entries.push(entry);
    }
    entry = createEntry();
    field = null;
    hasMsgid = false;
  };

  for (const rawLine of content.replace(/\r\n/g, '\n').split('\n')) {
    let line = rawLine.trimEnd();

    if (line.trim() === '') {
      if (hasMsgid) flush();
      continue;
    }

    const obsoleteLine = line.startsWith('#~');
    if (obsoleteLine) {
      line = line.slice(2).trim();
      if (line.startsWith('|')) continue; // previous values of obsolete entries
    } else if (line.startsWith('#')) {
      // A comment after a complete entry starts the next one
      if (hasMsgid && field !== null) flush();

      if (line.startsWith('#.')) {
        entry.extractedComments.push(line.slice(2).trim());
      } else if (line.startsWith('#:')) {
        entry.references.push(line.slice(2).trim());
      } else if (line.startsWith('#,')) {
        entry.flags.push(...line.slice(2).split(',').map((f) => f.trim()).filter(Boolean));
      } else if (line.startsWith('#|')) {
        const previous = /^#\|\s+msgid\s+(".*")$/.exec(line);
        if (previous) {
          entry.previousMsgid = quoted(previous[1]) ?? undefined;
        }
      } else {
        entry.comments.push(line.slice(1).trim());
      }
      continue;
    }

    const keyword = /^(msgctxt|msgid_plural|msgid|msgstr\[(\d+)\]|msgstr)\s+(".*")$/.exec(line);
    if (keyword) {
      const value = quoted(keyword[3]) ?? '';
      const name = keyword[1];

      // msgctxt or msgid after a msgstr begins a new entry
      if ((name === 'msgctxt' || name === 'msgid') && hasMsgid && field !== 'msgctxt') {
        flush();
      }
      if (obsoleteLine) {
        entry.obsolete = true;
      }

      if (name === 'msgctxt') {
        entry.msgctxt = value;
        field = 'msgctxt';
      } else if (name === 'msgid') {
        entry.msgid = value;
        field = 'msgid';
        hasMsgid = true;
      } else if (name === 'msgid_plural') {
        entry.msgidPlural = value;
        field = 'msgid_plural';
      } else if (name === 'msgstr') {
        entry.msgstr = value;
        field = 'msgstr';
      } else {
        const index = Number(keyword[2]);
        entry.msgstrPlural = entry.msgstrPlural ?? [];
        entry.msgstrPlural[index] = value;
        field = index;
      }
      continue;
    }

    const continuation = quoted(line);
    if (continuation !== null && field !== null) {
      if (field === 'msgctxt') entry.msgctxt = (entry.msgctxt ?? '') + continuation;
      else if (field === 'msgid') entry.msgid += continuation;
      else if (field === 'msgid_plural') entry.msgidPlural = (entry.msgidPlural ?? '') + continuation;
      else if (field === 'msgstr') entry.msgstr += continuation;
      else if (entry.msgstrPlural) entry.msgstrPlural[field] = (entry.msgstrPlural[field] ?? '') + continuation;
    }
  }

  flush();

  // Sparse plural arrays from out-of-order indices
  for (const parsed of entries) {
    if (parsed.msgstrPlural) {
      parsed.msgstrPlural = Array.from(parsed.msgstrPlural, (text) => text ?? '');
    }
  }

  return entries;
}

// ============================================
// Serialization
// ============================================

function serializeString(keyword: string, value: string, prefix: string): string[] {
  const pieces = value.match(/[^\n]*\n|[^\n]+/g) ?? [''];
  if (pieces.length <= 1) {
    return [`${prefix}${keyword} "${escapePo(value)}"`];
  }
  return [`${prefix}${keyword} ""`, ...pieces.map((piece) => `${prefix}"${escapePo(piece)}"`)];
}

export function serializeEntry(entry: PoEntry): string {
  const lines: string[] = [];
  const prefix = entry.obsolete ? '#~ ' : '';

  lines.push(...entry.comments.map((c) => (c ? `# ${c}` : '#')));
  lines.push(...entry.extractedComments.map((c) => `#. ${c}`));
  lines.push(...entry.references.map((r) => `#: ${r}`));
  if (entry.flags.length > 0) {
    lines.push(`#, ${entry.flags.join(', ')}`);
  }
  if (entry.previousMsgid !== undefined) {
    lines.push(`#| msgid "${escapePo(entry.previousMsgid)}"`);
  }

  if (entry.msgctxt !== undefined) {
    lines.push(...serializeString('msgctxt', entry.msgctxt, prefix));
  }
  lines.push(...serializeString('msgid', entry.msgid, prefix));

  if (entry.msgidPlural !== undefined) {
    lines.push(...serializeString('msgid_plural', entry.msgidPlural, prefix));
    const forms = entry.msgstrPlural && entry.msgstrPlural.length > 0 ? entry.msgstrPlural : [entry.msgstr];
    forms.forEach((text, index) => {
      lines.push(...serializeString(`msgstr[${index}]`, text, prefix));
    });
  } else {
    lines.push(...serializeString('msgstr', entry.msgstr, prefix));
  }

  return lines.join('\n');
}

export function serializePo(entries: PoEntry[]): string {
  return entries.map(serializeEntry).join('\n\n') + '\n';
}

// ============================================
// Text projection
// ============================================

function statusLabel(entry: PoEntry): string {
  if (entry.obsolete) return 'OBSOLETE';
  if (isFuzzy(entry)) return 'FUZZY';
  if (isTranslated(entry)) return 'TRANSLATED';
  return 'UNTRANSLATED';
}

function isShown(entry: PoEntry, filter: CatalogFilter): boolean {
  if (entry.obsolete && !filter.includeObsolete) return false;
  if (isFuzzy(entry) && !filter.includeFuzzy) return false;
  if (!isTranslated(entry) && !filter.includeUntranslated) return false;
  return true;
}

/**
 * Render the catalog as the labelled text the translator works on
 */
export function renderCatalog(
  header: PoEntry | null,
  entries: PoEntry[],
  filter: CatalogFilter = DEFAULT_CATALOG_FILTER
): string {
  const out: string[] = [];

  if (filter.includeMetadata && header) {
    out.push(SECTION_RULE, 'METADATA', SECTION_RULE);
    out.push(...header.msgstr.split('\n').filter((line) => line.trim().length > 0));
    out.push('');
  }

  const total = entries.length;
  const translated = entries.filter((e) => isTranslated(e) && !isFuzzy(e)).length;
  const fuzzy = entries.filter(isFuzzy).length;
  const untranslated = entries.filter((e) => !isTranslated(e)).length;
  const obsolete = entries.filter((e) => e.obsolete).length;

  out.push(SECTION_RULE, 'STATISTICS', SECTION_RULE);
  out.push(`Total Entries: ${total}`);
  out.push(`Translated: ${translated}`);
  out.push(`Fuzzy: ${fuzzy}`);
  out.push(`Untranslated: ${untranslated}`);
  if (obsolete > 0) {
    out.push(`Obsolete: ${obsolete}`);
  }
  if (total > 0) {
    out.push(`Completion: ${((translated / total) * 100).toFixed(1)}%`);
  }
  out.push('', SECTION_RULE, 'ENTRIES', SECTION_RULE, '');

  entries.forEach((entry, i) => {
    if (!isShown(entry, filter)) return;

    out.push(ENTRY_SEPARATOR, `[Entry ${i + 1}] [${statusLabel(entry)}]`, '');

    if (filter.includeComments && entry.flags.length > 0) {
      out.push(`Flags: ${entry.flags.join(', ')}`, '');
    }
    if (entry.msgctxt) {
      out.push(`Context: ${entry.msgctxt}`, '');
    }
    if (filter.includeComments) {
      out.push(...entry.comments.map((c) => `# ${c}`));
      out.push(...entry.extractedComments.map((c) => `#. ${c}`));
      out.push(...entry.references.map((r) => `#: ${r}`));
      if (entry.comments.length + entry.extractedComments.length + entry.references.length > 0) {
        out.push('');
      }
    }

    out.push('Original:', entry.msgid, '');
    if (entry.msgidPlural !== undefined) {
      out.push('Plural:', entry.msgidPlural, '');
    }

    out.push('Translation:');
    if (entry.msgstrPlural && entry.msgstrPlural.length > 0) {
      entry.msgstrPlural.forEach((text, index) => {
        out.push(`  [Plural form ${index}]: ${text.trim() ? text : NOT_TRANSLATED}`);
      });
    } else {
      out.push(entry.msgstr.trim() ? entry.msgstr : NOT_TRANSLATED);
    }
    out.push('');

    if (filter.includeComments && entry.previousMsgid) {
      out.push(`Previous msgid: ${entry.previousMsgid}`, '');
    }
  });

  return out.join('\n');
}

// ============================================
// Reassembly
// ============================================

interface ParsedBlock {
  msgctxt?: string;
  msgid: string;
  msgstr: string;
  msgstrPlural: string[];
}

function parseBlock(block: string): ParsedBlock {
  const sections: Record<'msgid' | 'msgid_plural' | 'msgstr', string[]> = {
    msgid: [],
    msgid_plural: [],
    msgstr: [],
  };
  const plural: string[] = [];
  let msgctxt: string | undefined;
  let current: keyof typeof sections | null = null;

  for (const line of block.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[Entry') || trimmed.startsWith('Flags:') || trimmed.startsWith('Previous msgid:')) {
      current = null;
      continue;
    }
    if (trimmed.startsWith('Context:')) {
      msgctxt = trimmed.slice('Context:'.length).trim();
      current = null;
      continue;
    }
    if (trimmed === 'Original:') {
      current = 'msgid';
      continue;
    }
    if (trimmed === 'Plural:') {
      current = 'msgid_plural';
      continue;
    }
    if (trimmed === 'Translation:') {
      current = 'msgstr';
      continue;
    }
    if (current === null) continue;

    if (current === 'msgstr') {
      const form = /^\s*\[Plural form (\d+)\]:\s*(.*)$/.exec(line);
      if (form) {
        const text = form[2].trim();
        plural[Number(form[1])] = text === NOT_TRANSLATED ? '' : text;
        continue;
      }
    }
    sections[current].push(line);
  }

  const msgstr = sections.msgstr.join('\n').trim();
  return {
    msgctxt,
    msgid: sections.msgid.join('\n').trim(),
    msgstr: msgstr === NOT_TRANSLATED ? '' : msgstr,
    msgstrPlural: Array.from(plural, (text) => text ?? ''),
  };
}

function entryKey(msgctxt: string | undefined, msgid: string): string {
  const context = msgctxt?.trim();
  return context ? `${context}${CONTEXT_GLUE}${msgid.trim()}` : msgid.trim();
}

/**
 * Write translations from the projected text back onto copies of the
 * original entries. Entries with no matching block keep their content.
 */
export function assembleCatalog(translatedText: string, header: PoEntry | null, entries: PoEntry[]): PoEntry[] {
  const assembled = entries.map((entry) => ({
    ...entry,
    msgstrPlural: entry.msgstrPlural ? [...entry.msgstrPlural] : undefined,
  }));
  const byKey = new Map(assembled.map((entry) => [entryKey(entry.msgctxt, entry.msgid), entry]));

  // The first part is the metadata/statistics preamble
  for (const block of translatedText.split(ENTRY_SEPARATOR).slice(1)) {
    if (!block.trim()) continue;

    const parsed = parseBlock(block);
    const entry = byKey.get(entryKey(parsed.msgctxt, parsed.msgid));
    if (!entry) continue;

    if (entry.msgidPlural !== undefined && parsed.msgstrPlural.length > 0) {
      entry.msgstrPlural = parsed.msgstrPlural;
    } else {
      entry.msgstr = parsed.msgstr;
    }
  }

  return header ? [{ ...header }, ...assembled] : assembled;
}

// ============================================
// Codec
// ============================================

export class CatalogCodec implements DocumentCodec<'catalog'> {
  readonly format = 'catalog';
  readonly extensions = ['.po', '.pot'] as const;
  readonly requiresReassembly = true;

  constructor(private readonly filter: CatalogFilter = DEFAULT_CATALOG_FILTER) {}

  async decode(bytes: Buffer, filename: string): Promise<DocumentOf<'catalog'>> {
    const parsed = parsePo(new TextDecoder('utf-8').decode(bytes));
    if (parsed.length === 0) {
      throw new DecodeError(`No gettext entries found in ${filename}`, { filename });
    }

    const header = parsed.find(isHeader) ?? null;
    const entries = parsed.filter((entry) => entry !== header);

    return {
      format: 'catalog',
      filename,
      text: renderCatalog(header, entries, this.filter),
      metadata: { header, entries, filter: this.filter },
    };
  }

  async encode(translatedText: string, doc: DocumentOf<'catalog'>): Promise<EncodedArtifact> {
    const entries = assembleCatalog(translatedText, doc.metadata.header, doc.metadata.entries);
    return {
      name: `assembled_${doc.filename}`,
      body: serializePo(entries),
      contentType: 'text/x-gettext-translation',
    };
  }
}
