import type { AdvisoryReport, ChatMessage, ChatRole } from '../types';

/** Rundown and report joined the way they are shown, copied and sent back to the model. */
export const composeReportText = ({ rundown, fullReport }: AdvisoryReport): string =>
  rundown ? `${rundown}\n\n${fullReport}` : fullReport;

/**
 * Per-page state: at most one report, and the follow-up transcript about it.
 * Storing a new report always starts a fresh transcript.
 */
export class PlannerSession {
  private report: AdvisoryReport | null = null;
  private messages: ChatMessage[] = [];

  storeReport(rundown: string, fullReport: string): void {
    this.report = { rundown, fullReport };
    this.messages = [];
  }

  appendTurn(role: ChatRole, content: string): void {
    this.messages.push({ role, content });
  }

  /** The text follow-ups are answered from, or '' before the first report. */
  currentReport(): string {
    return this.report ? composeReportText(this.report) : '';
  }

  latestReport(): AdvisoryReport | null {
    return this.report;
  }

  get hasReport(): boolean {
    return this.currentReport() !== '';
  }

  get conversation(): ChatMessage[] {
    return this.messages.map(message => ({ ...message }));
  }
}
