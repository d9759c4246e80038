/** Free-text completion. Output is untrusted and may be malformed. */
export interface IReasoningClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}
