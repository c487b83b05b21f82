import type { EventBus, MeterReading, NumberedLine, ParseSummary, ParseWarning } from '@nem12sql/core';
import { Nem12FormatError } from '@nem12sql/core';
import { RecordType } from '../domain/RecordType.js';
import { DONE, INITIAL_STATE, withContext } from '../domain/ParserState.js';
import type { ParserState } from '../domain/ParserState.js';
import { parseContextRecord } from '../domain/records/parseContextRecord.js';
import { expandIntervalRecord } from '../domain/records/parseIntervalRecord.js';
import { splitFields } from '../infrastructure/splitFields.js';

/**
 * Mutable state for a single parse invocation: the active meter context plus counters.
 *
 * Internal to the package. `Nem12Parser` creates one per call, so parses never
 * share state.
 */
export class ParseSession {
  private state: ParserState = INITIAL_STATE;
  private linesRead = 0;
  private readingsEmitted = 0;
  private contextsOpened = 0;
  private skippedValues = 0;

  constructor(private readonly eventBus: EventBus) {}

  /** `true` once a `900` record has been consumed. No further line should be fed. */
  get done(): boolean {
    return this.state.kind === 'done';
  }

  /** Consume one line and yield the readings it produces. */
  *accept(line: NumberedLine): Generator<MeterReading, void, undefined> {
    if (this.state.kind === 'done') return;
    this.linesRead = line.lineNumber;

    if (line.text.trim() === '') return;

    const fields = splitFields(line.text);
    const recordType = (fields[0] ?? '').trim();

    switch (recordType) {
      case RecordType.NMI_DATA_DETAILS: {
        const context = parseContextRecord(fields, line.lineNumber);
        this.state = withContext(context);
        this.contextsOpened++;
        this.eventBus.emit({
          type: 'context:opened',
          lineNumber: line.lineNumber,
          nmi: context.nmi,
          intervalMinutes: context.intervalMinutes,
          timestamp: Date.now(),
        });
        return;
      }

      case RecordType.INTERVAL_DATA: {
        const state = this.state;
        if (state.kind !== 'has-context') {
          throw new Nem12FormatError(
            line.lineNumber,
            'MISSING_CONTEXT',
            '300 record found without preceding 200 record',
          );
        }
        const onSkipped = (warning: ParseWarning): void => {
          this.skip(warning);
        };
        for (const reading of expandIntervalRecord(fields, state.context, line.lineNumber, onSkipped)) {
          this.readingsEmitted++;
          yield reading;
        }
        return;
      }

      case RecordType.END_OF_DATA:
        this.state = DONE;
        this.eventBus.emit({ type: 'parse:terminated', lineNumber: line.lineNumber, timestamp: Date.now() });
        return;

      default:
        // 100, 400, 500 and unknown indicators carry nothing the readings need.
        return;
    }
  }

  summary(): ParseSummary {
    return {
      linesRead: this.linesRead,
      readingsEmitted: this.readingsEmitted,
      contextsOpened: this.contextsOpened,
      skippedValues: this.skippedValues,
      terminated: this.state.kind === 'done',
    };
  }

  private skip(warning: ParseWarning): void {
    this.skippedValues++;
    this.eventBus.emit({ type: 'value:skipped', warning, timestamp: Date.now() });
  }
}
