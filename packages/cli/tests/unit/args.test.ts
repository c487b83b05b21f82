import { describe, it, expect } from 'vitest';
import { parseCliArgs, UsageError } from '../../src/args.js';

describe('parseCliArgs', () => {
  it('should default to stdout and a batch size of 1000', () => {
    expect(parseCliArgs(['meter.csv'])).toEqual({ kind: 'run', inputPath: 'meter.csv', batchSize: 1000 });
  });

  it('should read short options', () => {
    expect(parseCliArgs(['meter.csv', '-o', 'out.sql', '-b', '50'])).toEqual({
      kind: 'run',
      inputPath: 'meter.csv',
      outputPath: 'out.sql',
      batchSize: 50,
    });
  });

  it('should read long options before the input path', () => {
    expect(parseCliArgs(['--output', 'out.sql', '--batch-size', '5000', 'meter.csv'])).toEqual({
      kind: 'run',
      inputPath: 'meter.csv',
      outputPath: 'out.sql',
      batchSize: 5000,
    });
  });

  it('should read --option=value forms', () => {
    expect(parseCliArgs(['--batch-size=7', '--output=x.sql', 'meter.csv'])).toEqual({
      kind: 'run',
      inputPath: 'meter.csv',
      outputPath: 'x.sql',
      batchSize: 7,
    });
  });

  it('should accept - as the input path', () => {
    expect(parseCliArgs(['-'])).toEqual({ kind: 'run', inputPath: '-', batchSize: 1000 });
  });

  it('should pass non-positive batch sizes through for the generator to reject', () => {
    expect(parseCliArgs(['meter.csv', '-b', '0'])).toMatchObject({ batchSize: 0 });
    expect(parseCliArgs(['meter.csv', '-b', '-3'])).toMatchObject({ batchSize: -3 });
  });

  it('should return help regardless of other arguments', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['meter.csv', '-h', '--bogus'])).toEqual({ kind: 'help' });
  });

  it('should reject a missing input file', () => {
    expect(() => parseCliArgs([])).toThrow(new UsageError('Missing input file'));
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['meter.csv', '--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('should reject a second positional argument', () => {
    expect(() => parseCliArgs(['a.csv', 'b.csv'])).toThrow('Unexpected argument: b.csv');
  });

  it('should reject an option without its value', () => {
    expect(() => parseCliArgs(['meter.csv', '-o'])).toThrow('Option -o requires a value');
  });

  it('should reject a batch size that is not an integer', () => {
    expect(() => parseCliArgs(['meter.csv', '-b', 'ten'])).toThrow("Invalid batch size: 'ten'");
    expect(() => parseCliArgs(['meter.csv', '-b', '2.5'])).toThrow("Invalid batch size: '2.5'");
  });
});
