import { HttpStatus } from '@nestjs/common';
import { HookOutcome } from '../domain/enums';
import { NoEventDetectedError } from '../dispatch';
import { HookContext, HookResponse, PipelineError } from './types';

export interface ComposedOutcome {
  outcome: HookOutcome;
  response: HookResponse;
}

/**
 * Message reported after all triggers succeeded
 */
export function triggeredBuildsMessage(count: number): string {
  return count === 1
    ? 'Successfully triggered 1 build.'
    : `Successfully triggered ${count} builds.`;
}

export function skipMessage(reason: string): string {
  return `Acknowledged, but skipping. Reason: ${reason}`;
}

/**
 * Maps the state a hook context ended in to one client-facing response
 */
export class OutcomeComposer {
  compose(context: HookContext): ComposedOutcome {
    if (context.failure) {
      return this.reject(HookOutcome.REJECTED, [context.failure]);
    }

    if (context.skipReason !== undefined) {
      return this.accept(HookOutcome.ACKNOWLEDGED, skipMessage(context.skipReason));
    }

    const report = context.dispatchReport;
    if (!report) {
      return this.reject(HookOutcome.REJECTED, [
        new PipelineError('Hook processing finished without a result', 'compose'),
      ]);
    }

    if (report.attempted === 0) {
      return this.reject(
        HookOutcome.REJECTED,
        report.errors.length > 0 ? report.errors : [new NoEventDetectedError()],
      );
    }

    if (report.errors.length > 0) {
      return this.reject(HookOutcome.FAILED, report.errors);
    }

    return this.accept(HookOutcome.SUCCEEDED, triggeredBuildsMessage(report.attempted));
  }

  private accept(outcome: HookOutcome, message: string): ComposedOutcome {
    return {
      outcome,
      response: {
        accepted: true,
        statusCode: HttpStatus.OK,
        body: { message },
      },
    };
  }

  private reject(outcome: HookOutcome, errors: Error[]): ComposedOutcome {
    return {
      outcome,
      response: {
        accepted: false,
        statusCode: HttpStatus.BAD_REQUEST,
        body: { errors: errors.map((error) => error.message) },
      },
    };
  }
}
