/**
 * Console Output Adapter
 *
 * Line-oriented OutputPort for pipes and CI. Results go to stdout, errors
 * and warnings to stderr, and spinners print only their start and end.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  step: message => console.log(`  ${message}`),
  message: message => console.log(message),
  success: message => console.log(`✓ ${message}`),
  error: message => console.error(`✗ ${message}`),
  warn: message => console.error(`⚠ ${message}`),

  note(content, title) {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  async confirm(_message, options) {
    return options?.initial ?? false;
  },

  spinner(): UnifiedSpinner {
    let current = '';
    let running = false;
    const finish = (line: string): void => {
      if (!running) return;
      running = false;
      console.log(line);
    };
    return {
      start(message) {
        current = message;
        running = true;
        console.log(`… ${message}`);
      },
      message(text) {
        current = text;
      },
      stop(finalMessage) {
        finish(`✓ ${finalMessage ?? current}`);
      },
      fail(finalMessage) {
        finish(`✗ ${finalMessage}`);
      }
    };
  }
};
