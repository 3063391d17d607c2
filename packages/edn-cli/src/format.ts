/**
 * Line formatting for the event dump.
 */

import { type EdnError, type EdnEvent, Parser, charsOf, describeError, errorFromDetail } from 'edn-core';

export interface FormatOptions {
  /** Prefix each line with `line:column`. */
  positions?: boolean;
  /** Indent nested events by depth. */
  indent?: string;
}

export function describeEvent(event: EdnEvent): string {
  switch (event.type) {
    case 'nil':
      return 'nil';
    case 'boolean':
      return `boolean ${event.value}`;
    case 'string':
      return `string ${JSON.stringify(event.value)}`;
    case 'character':
      return `character ${JSON.stringify(event.value)}`;
    case 'symbol':
      return `symbol ${event.value}`;
    case 'keyword':
      return `keyword :${event.value}`;
    case 'integer':
      return `integer ${event.value}`;
    case 'float':
      return `float ${event.value}`;
    case 'tag':
      return `tag #${event.tag}`;
    case 'start':
      return `start ${event.collection}`;
    case 'end':
      return `end ${event.collection}`;
    case 'error':
      return event.error.type === 'syntax'
        ? `error ${event.error.code}`
        : `error ${event.error.type}: ${describeError(event.error)}`;
  }
}

/**
 * Format every event pulled from `events`, one line each. Nested events are
 * indented by their collection depth.
 */
export function formatEvents(events: Iterable<EdnEvent>, options: FormatOptions = {}): string[] {
  const indent = options.indent ?? '  ';
  const lines: string[] = [];
  let depth = 0;

  for (const event of events) {
    if (event.type === 'end') depth--;
    const prefix = options.positions ? `${event.line}:${event.column} ` : '';
    lines.push(prefix + indent.repeat(Math.max(depth, 0)) + describeEvent(event));
    if (event.type === 'start') depth++;
  }
  return lines;
}

export interface DumpOptions extends FormatOptions {
  /** Reject a comma directly before a closing delimiter. */
  strictCommas?: boolean;
  file?: string;
}

export interface DumpResult {
  lines: string[];
  /** Set when the stream ended with an error event. */
  error?: EdnError;
}

/** Parse a whole document and format its event stream. */
export function dumpDocument(text: string, options: DumpOptions = {}): DumpResult {
  const parser = new Parser(charsOf([text]), {
    allowTrailingComma: !options.strictCommas,
    file: options.file,
  });
  const events = [...parser];
  const lines = formatEvents(events, options);
  const last = events[events.length - 1];
  if (last?.type === 'error') {
    return { lines, error: errorFromDetail(last.error, options.file) };
  }
  return { lines };
}
