import { el, renderXml } from "../xml/xmlDocument";

export interface AddSubmissionOptions {
  /** Adds a HOLD action that makes the records public on this date (YYYY-MM-DD). */
  holdUntil?: string | null;
}

export function buildAddSubmissionXml(options: AddSubmissionOptions = {}): string {
  const actions = [el("ACTION", {}, [el("ADD")])];
  if (options.holdUntil) {
    actions.push(el("ACTION", {}, [el("HOLD", { HoldUntilDate: options.holdUntil })]));
  }
  return renderXml(el("SUBMISSION", {}, [el("ACTIONS", {}, actions)]));
}

export function buildReleaseSubmissionXml(accession: string): string {
  return renderXml(
    el("SUBMISSION", {}, [
      el("ACTIONS", {}, [
        el("ACTION", {}, [el("MODIFY")]),
        el("ACTION", {}, [el("RELEASE", { target: accession })])
      ])
    ])
  );
}
