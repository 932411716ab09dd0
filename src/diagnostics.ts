export type DiagnosticCode =
  | 'malformed_record'
  | 'unknown_player'
  | 'unknown_opponent'
  | 'opponent_already_resolved'
  | 'invalid_outcome'
  | 'outcome_mismatch'
  | 'output_write_failure';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  source?: string;
  line?: number;
  round?: string;
  playerId?: string;
  seat?: number;
  token?: string;
  path?: string;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

/**
 * Collects non-fatal problems so an organizer can audit which records and
 * games were not scored.
 */
export class DiagnosticLog {
  private readonly items: Diagnostic[] = [];

  constructor(private readonly listener?: DiagnosticListener) {}

  report(diagnostic: Diagnostic) {
    this.items.push(diagnostic);
    this.listener?.(diagnostic);
  }

  get entries(): readonly Diagnostic[] {
    return this.items;
  }

  byCode(code: DiagnosticCode) {
    return this.items.filter((item) => item.code === code);
  }
}

export const logDiagnostic: DiagnosticListener = ({ code, message, ...context }) => {
  console.warn(code, { message, ...context });
};
