/**
 * Parsed URI View
 *
 * Read-only view over a URI string that already passed the grammar.
 * Every component is kept in its encoded form.
 */

import { QueryParams } from './query-params';

export interface UriParts {
  scheme: string;
  /** Undefined when the URI has no "//" authority */
  authority?: {
    userinfo?: string;
    host: string;
    port?: string;
  };
  path: string;
  /** Offset of the path in the URI text */
  pathOffset: number;
  query?: string;
  fragment?: string;
}

export class UriView {
  /** The text the URI was parsed from, exactly as given */
  readonly buffer: string;
  readonly scheme: string;
  readonly path: string;
  readonly pathOffset: number;
  private readonly parts: UriParts;

  constructor(buffer: string, parts: UriParts) {
    this.buffer = buffer;
    this.parts = parts;
    this.scheme = parts.scheme;
    this.path = parts.path;
    this.pathOffset = parts.pathOffset;
  }

  get hasAuthority(): boolean {
    return this.parts.authority !== undefined;
  }

  get userinfo(): string | undefined {
    return this.parts.authority?.userinfo;
  }

  get host(): string {
    return this.parts.authority?.host ?? '';
  }

  get port(): string | undefined {
    return this.parts.authority?.port;
  }

  get hasQuery(): boolean {
    return this.parts.query !== undefined;
  }

  /** Encoded query without the leading "?" */
  get query(): string | undefined {
    return this.parts.query;
  }

  get fragment(): string | undefined {
    return this.parts.fragment;
  }

  /**
   * The query parameters, split on iteration
   */
  params(): QueryParams {
    return new QueryParams(this.parts.query);
  }

  toString(): string {
    return this.buffer;
  }
}
