/**
 * In-process QuerySession stand-in.
 *
 * Responses are registered against a SQL fragment (substring, whitespace
 * collapsed) or a regular expression; the first matching handler wins and
 * unmatched queries return no rows. Every call is recorded.
 */

import type { BindParameters, QuerySession, Row } from '../../src/connectors/index.js';

export type FakeResponse = Row[] | ((binds: BindParameters, sql: string) => Row[]);

interface Handler {
  matcher: string | RegExp;
  response: FakeResponse;
}

export interface RecordedCall {
  sql: string;
  binds: BindParameters;
}

function normalize(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

export class FakeSession implements QuerySession {
  readonly calls: RecordedCall[] = [];
  closed = false;
  private readonly handlers: Handler[] = [];

  /** Return rows for queries matching the fragment */
  on(matcher: string | RegExp, response: FakeResponse): this {
    this.handlers.push({ matcher, response });
    return this;
  }

  /** Throw the given error for queries matching the fragment */
  failOn(matcher: string | RegExp, error: unknown): this {
    return this.on(matcher, () => {
      throw error;
    });
  }

  async execute(sql: string, binds: BindParameters = {}): Promise<Row[]> {
    const text = normalize(sql);
    this.calls.push({ sql: text, binds });

    const handler = this.handlers.find((h) =>
      typeof h.matcher === 'string' ? text.includes(normalize(h.matcher)) : h.matcher.test(text)
    );
    if (!handler) return [];
    return typeof handler.response === 'function' ? handler.response(binds, text) : handler.response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Recorded calls whose SQL contains the fragment */
  callsMatching(fragment: string): RecordedCall[] {
    const wanted = normalize(fragment);
    return this.calls.filter((call) => call.sql.includes(wanted));
  }
}
