/**
 * Context Memory - the last subject a session asked about
 */

export class ContextMemory {
  private subject: string;

  constructor(initialSubject: string = '') {
    this.subject = initialSubject;
  }

  recall(): string {
    return this.subject;
  }

  remember(subject: string): void {
    this.subject = subject;
  }

  isEmpty(): boolean {
    return this.subject.length === 0;
  }
}
