/**
 * SessionState - last submitted code and last store contents of the web UI
 *
 * Lives as long as the UI server that owns it. Written by POST handling,
 * read by page rendering.
 */

export type SessionPhase = 'idle' | 'has-result';

export class SessionState {
  private code = '';
  private storeContents = '';
  private phase: SessionPhase = 'idle';

  get lastSubmittedCode(): string {
    return this.code;
  }

  get lastStoreContents(): string {
    return this.storeContents;
  }

  get state(): SessionPhase {
    return this.phase;
  }

  /**
   * Record code as submitted; happens before the node has answered
   */
  submit(code: string): void {
    this.code = code;
  }

  /**
   * Record the node's answer to the last submission
   */
  complete(storeContents: string): void {
    this.storeContents = storeContents;
    this.phase = 'has-result';
  }
}
