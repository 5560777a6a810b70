/**
 * Terminal outcomes of a running session.
 *
 * An outcome is a value, not an exception: the system that detects it
 * returns it, the pipeline stops running the rest of the frame, and the
 * session controller is the only consumer.
 */
export type TerminalOutcome =
  | { kind: 'lose'; score: number }
  | { kind: 'victory'; score: number }
  | { kind: 'score'; score: number }
  | { kind: 'restart'; score: number };

export type OutcomeKind = TerminalOutcome['kind'];

export function describeOutcome(outcome: TerminalOutcome): string {
  const points = Math.floor(outcome.score);
  switch (outcome.kind) {
    case 'lose':
      return `Hull breached after ${points} px`;
    case 'victory':
      return `Victory! ${points} px sailed`;
    case 'score':
      return `Time up: ${points} px`;
    case 'restart':
      return 'Restarting';
  }
}
