import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    switch (code.kind) {
      case 'failure':
        return process.exit(1);
      default:
        return assertNever(code);
    }
  }
}
