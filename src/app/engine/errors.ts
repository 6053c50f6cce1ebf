import type { Domain, MetricKind } from '../types/ranking';

export interface RankingErrorContext {
  domain?: Domain;
  entity_id?: string;
  area_id?: string;
  metric_kind?: MetricKind;
}

/**
 * Fatal configuration problem: unregistered area direction, malformed
 * category bands, unusable weights. Raised before any scoring begins.
 */
export class RankingConfigError extends Error {
  context: RankingErrorContext;

  constructor(message: string, context: RankingErrorContext = {}) {
    super(message);
    this.name = 'RankingConfigError';
    this.context = context;
  }
}

/** A stored list value that is neither a JSON array nor a legacy bracket list. */
export class ListFormatError extends Error {
  input: string;
  offset: number;

  constructor(message: string, input: string, offset: number) {
    super(message);
    this.name = 'ListFormatError';
    this.input = input;
    this.offset = offset;
  }
}
