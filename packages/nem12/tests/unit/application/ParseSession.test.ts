import { describe, it, expect } from 'vitest';
import { EventBus } from '@nem12sql/core';
import { ParseSession } from '../../../src/application/ParseSession.js';
import { contextRecord, intervalRecord } from '../../fixtures.js';

function feed(session: ParseSession, lineNumber: number, text: string) {
  return [...session.accept({ lineNumber, text })];
}

describe('ParseSession', () => {
  it('should start without a context', () => {
    const session = new ParseSession(new EventBus());

    expect(() => feed(session, 1, intervalRecord('20050301', ['1']))).toThrow('without preceding 200 record');
  });

  it('should replace the context on every 200 record', () => {
    const session = new ParseSession(new EventBus());

    feed(session, 1, contextRecord('NMI0000001'));
    feed(session, 2, contextRecord('NMI0000002', 15));
    const readings = feed(session, 3, intervalRecord('20050301', ['1'], 96));

    expect(readings.map((r) => r.nmi)).toEqual(['NMI0000002']);
    expect(readings[0]?.timestamp.toFormat('HH:mm')).toBe('00:15');
  });

  it('should keep the previous context when a 200 record is rejected', () => {
    const session = new ParseSession(new EventBus());
    feed(session, 1, contextRecord('NMI0000001'));

    expect(() => feed(session, 2, contextRecord('NMI0000002', 'x'))).toThrow('Invalid interval length');
    expect(feed(session, 3, intervalRecord('20050301', ['1'])).map((r) => r.nmi)).toEqual(['NMI0000001']);
  });

  it('should become done on a 900 record and ignore further lines', () => {
    const session = new ParseSession(new EventBus());
    feed(session, 1, '900');

    expect(session.done).toBe(true);
    expect(feed(session, 2, intervalRecord('20050301', ['1']))).toEqual([]);
    expect(session.summary()).toEqual({
      linesRead: 1,
      readingsEmitted: 0,
      contextsOpened: 0,
      skippedValues: 0,
      terminated: true,
    });
  });

  it('should treat whitespace around the record indicator as insignificant', () => {
    const session = new ParseSession(new EventBus());
    feed(session, 1, contextRecord('NMI0000001'));

    expect(feed(session, 2, ` 300 ,20050301,1.5`).map((r) => r.consumption.toFixed())).toEqual(['1.5']);
  });
});
