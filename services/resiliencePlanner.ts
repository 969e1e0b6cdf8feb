import {
  PlannerStatus,
  type FarmProfile,
  type FollowUpOutcome,
  type PlanOutcome,
  type PlannerSnapshot,
} from '../types';
import type { AdvisoryModel } from './geminiService';
import { PlannerSession } from './plannerSession';
import { buildChatPrompt, buildPlanPrompt } from './promptService';
import { splitRundown } from './rundownParser';

export const BUSY_MESSAGE = 'A request is already in progress.';
export const NO_PLAN_MESSAGE = 'Generate a resilience plan above first. Then you can ask follow-up questions here.';
export const EMPTY_REPLY = 'Could not generate a reply.';
export const EMPTY_PLAN = 'The model returned an empty plan.';

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Drives the two user actions, generating a plan and answering a follow-up,
 * one model call at a time. Model failures never escape: they come back as
 * `{ ok: false }` outcomes with the session left as described on each method.
 */
export class ResiliencePlanner {
  private status: PlannerStatus = PlannerStatus.IDLE;

  constructor(
    private readonly model: AdvisoryModel,
    private readonly session: PlannerSession = new PlannerSession()
  ) {}

  get isBusy(): boolean {
    return this.status === PlannerStatus.GENERATING || this.status === PlannerStatus.ANSWERING;
  }

  private settle(): void {
    this.status = this.session.hasReport ? PlannerStatus.READY : PlannerStatus.IDLE;
  }

  /** An empty plan counts as a failure. On failure the previous report and transcript are kept as they were. */
  async generatePlan(profile: FarmProfile): Promise<PlanOutcome> {
    if (this.isBusy) return { ok: false, error: BUSY_MESSAGE };

    this.status = PlannerStatus.GENERATING;
    try {
      const text = await this.model.generate(buildPlanPrompt(profile));
      const report = splitRundown(text);
      if (!report.fullReport.trim()) throw new Error(EMPTY_PLAN);
      this.session.storeReport(report.rundown, report.fullReport);
      return { ok: true, report };
    } catch (error) {
      console.error('Plan Generation Error:', error);
      return { ok: false, error: `Error generating plan: ${describeError(error)}` };
    } finally {
      this.settle();
    }
  }

  /** On failure the question still goes into the transcript, answered by the error. */
  async askFollowUp(question: string): Promise<FollowUpOutcome> {
    if (this.isBusy) return { ok: false, error: BUSY_MESSAGE, refused: true };
    if (!this.session.hasReport) return { ok: false, error: NO_PLAN_MESSAGE, refused: true };
    if (!question.trim()) return { ok: false, error: 'Ask a question about your plan.', refused: true };

    this.status = PlannerStatus.ANSWERING;
    try {
      const reply = (await this.model.generate(buildChatPrompt(this.session.currentReport(), question))) || EMPTY_REPLY;
      this.session.appendTurn('user', question);
      this.session.appendTurn('assistant', reply);
      return { ok: true, reply };
    } catch (error) {
      console.error('Follow-up Error:', error);
      const message = describeError(error);
      this.session.appendTurn('user', question);
      this.session.appendTurn('assistant', `Error: ${message}`);
      return { ok: false, error: message, refused: false };
    } finally {
      this.settle();
    }
  }

  snapshot(): PlannerSnapshot {
    return {
      status: this.status,
      report: this.session.latestReport(),
      conversation: this.session.conversation,
    };
  }
}
