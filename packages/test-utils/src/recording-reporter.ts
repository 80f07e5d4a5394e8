import {
  type ExecutionView,
  type Reporter,
  type Suite,
  type TestCase,
  type TestCaseRecord,
  type TestCaseStatus,
  testCaseId
} from '@benchrun/core';

export type ReporterEvent =
  | { type: 'message'; level: 'notice' | 'info' | 'warning' | 'error'; message: string; details?: string }
  | { type: 'error-from'; error: unknown }
  | { type: 'target-list'; suite: string }
  | { type: 'test-list'; suite: string }
  | { type: 'started'; target: string; testCaseId: string; status: TestCaseStatus }
  | { type: 'result'; target: string; testCaseId: string; status: TestCaseStatus }
  | { type: 'summary'; suite: string; targets: string[] }
  | { type: 'total-time'; durationMs: number };

/**
 * Reporter that keeps every notification in order
 */
export class RecordingReporter implements Reporter {
  readonly events: ReporterEvent[] = [];

  notice(message: string, details?: string): void {
    this.events.push({ type: 'message', level: 'notice', message, details });
  }

  info(message: string, details?: string): void {
    this.events.push({ type: 'message', level: 'info', message, details });
  }

  warning(message: string, details?: string): void {
    this.events.push({ type: 'message', level: 'warning', message, details });
  }

  error(message: string, details?: string): void {
    this.events.push({ type: 'message', level: 'error', message, details });
  }

  errorFrom(error: unknown): void {
    this.events.push({ type: 'error-from', error });
  }

  reportTargetList(suite: Suite): void {
    this.events.push({ type: 'target-list', suite: suite.config.name });
  }

  reportTestList(suite: Suite): void {
    this.events.push({ type: 'test-list', suite: suite.config.name });
  }

  reportTestCaseStarted(testCase: TestCase, target: string, record: TestCaseRecord): void {
    this.events.push({
      type: 'started',
      target,
      testCaseId: testCaseId(testCase),
      status: record.status
    });
  }

  reportTestCaseResult(testCase: TestCase, target: string, record: TestCaseRecord): void {
    this.events.push({
      type: 'result',
      target,
      testCaseId: testCaseId(testCase),
      status: record.status
    });
  }

  reportExecutionSummary(suite: Suite, executions: readonly ExecutionView[]): void {
    this.events.push({
      type: 'summary',
      suite: suite.config.name,
      targets: executions.map((execution) => execution.target)
    });
  }

  reportTotalTime(durationMs: number): void {
    this.events.push({ type: 'total-time', durationMs });
  }

  /**
   * `target/path::name` of every result, in order
   */
  results(): string[] {
    return this.events.flatMap((event) =>
      event.type === 'result' ? [`${event.target}/${event.testCaseId}`] : []
    );
  }

  messages(level?: 'notice' | 'info' | 'warning' | 'error'): string[] {
    return this.events.flatMap((event) =>
      event.type === 'message' && (level === undefined || event.level === level)
        ? [event.message]
        : []
    );
  }
}
