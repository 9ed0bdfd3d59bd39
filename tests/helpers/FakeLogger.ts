
/**
 * Fake logger for testing. Fakes over mocks: captures calls for assertions.
 */
export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  obj?: object;
  msg?: string;
}

export class FakeLogger {
  readonly entries: LogEntry[] = [];
  readonly bindings: object[] = [];

  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  debug(objOrMsg: object | string, msg?: string): void {
    this.log('debug', objOrMsg, msg);
  }

  info(obj: object, msg?: string): void;
  info(msg: string): void;
  info(objOrMsg: object | string, msg?: string): void {
    this.log('info', objOrMsg, msg);
  }

  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  warn(objOrMsg: object | string, msg?: string): void {
    this.log('warn', objOrMsg, msg);
  }

  error(obj: object, msg?: string): void;
  error(msg: string): void;
  error(objOrMsg: object | string, msg?: string): void {
    this.log('error', objOrMsg, msg);
  }

  /** Shares entries with the parent so one logger sees a component's whole output */
  child(bindings: object): FakeLogger {
    this.bindings.push(bindings);
    return this;
  }

  private log(level: LogEntry['level'], objOrMsg: object | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.entries.push({ level, msg: objOrMsg });
    } else {
      this.entries.push({ level, obj: objOrMsg, msg });
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  hasEntry(level: LogEntry['level'], msgContains: string): boolean {
    return this.entries.some(e => e.level === level && e.msg?.includes(msgContains));
  }

  getEntries(level?: LogEntry['level']): LogEntry[] {
    return level ? this.entries.filter(e => e.level === level) : [...this.entries];
  }
}
