/**
 * Graph engine error taxonomy.
 */

import { TrellisError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Handle } from '../../types/graph.js';

export type GraphErrorReason =
  | 'InvalidHandle'
  | 'MalformedHandle'
  | 'InvalidAlias'
  | 'InvalidDate'
  | 'MalformedDate'
  | 'CycleDetected'
  | 'NotTaskNode';

const REASON_CODES: Record<GraphErrorReason, ExitCode> = {
  InvalidHandle: ExitCode.INVALID_HANDLE,
  MalformedHandle: ExitCode.MALFORMED_HANDLE,
  InvalidAlias: ExitCode.INVALID_ALIAS,
  InvalidDate: ExitCode.INVALID_DATE,
  MalformedDate: ExitCode.MALFORMED_DATE,
  CycleDetected: ExitCode.CYCLE_DETECTED,
  NotTaskNode: ExitCode.NOT_TASK_NODE,
};

/** Error raised by a graph operation on bad input. */
export class GraphError extends TrellisError {
  readonly reason: GraphErrorReason;
  /** The offending token or handle(s). */
  readonly subject: string | Handle | readonly [Handle, Handle];

  constructor(
    reason: GraphErrorReason,
    subject: string | Handle | readonly [Handle, Handle],
    message: string,
    fix?: string,
  ) {
    super(REASON_CODES[reason], message, { fix });
    this.name = 'GraphError';
    this.reason = reason;
    this.subject = subject;
  }

  static invalidHandle(handle: Handle): GraphError {
    return new GraphError('InvalidHandle', handle, `Invalid handle: '${handle}'`,
      'Run `trellis ls -r` to list live node handles.');
  }

  static malformedHandle(token: string): GraphError {
    return new GraphError('MalformedHandle', token, `Malformed handle: '${token}'`);
  }

  static invalidAlias(alias: string): GraphError {
    return new GraphError('InvalidAlias', alias, `Invalid alias: '${alias}'`,
      'Run `trellis aliases` to list known aliases.');
  }

  static invalidDate(date: string): GraphError {
    return new GraphError('InvalidDate', date, `Invalid date: '${date}'`,
      'Create it first with `trellis add --date <date>`.');
  }

  static malformedDate(date: string): GraphError {
    return new GraphError('MalformedDate', date, `Malformed date string: '${date}'`);
  }

  static cycleDetected(start: Handle, reentered: Handle): GraphError {
    return new GraphError('CycleDetected', [start, reentered] as const,
      `Graph looped back: ${start}->...->${reentered}->${start}`,
      'Unlink one of the edges that closes the loop.');
  }

  static notTaskNode(handle: Handle): GraphError {
    return new GraphError('NotTaskNode', handle, `Node is not a task node: ${handle}`);
  }
}
