export interface SubmissionReceipt {
  raw: string;
  /** Root `success` attribute; null when the body is not a receipt document. */
  success: boolean | null;
  accession: string | null;
  messages: ReceiptMessage[];
}

export interface ReceiptMessage {
  level: "error" | "info";
  text: string;
}
