import type { Command } from 'commander';
import { createProgram, parseCliArguments } from '@/cli/arguments';

describe('parseCliArguments', () => {
  let output: string[];

  const program = (): Command =>
    createProgram('1.2.3')
      .exitOverride()
      .configureOutput({
        writeOut: (text) => output.push(text),
        writeErr: (text) => output.push(text),
      });

  beforeEach(() => {
    output = [];
  });

  it('should forward a kubectl command line untouched', () => {
    expect(parseCliArguments(['get', 'pods', '-A', '--help'], program())).toEqual({
      mode: 'run',
      argv: ['get', 'pods', '-A', '--help'],
      renewCache: false,
    });
  });

  it('should not treat multikube flags after the command as its own', () => {
    expect(parseCliArguments(['logs', 'web-1', '--init'], program())).toEqual({
      mode: 'run',
      argv: ['logs', 'web-1', '--init'],
      renewCache: false,
    });
  });

  it('should forward the short help and version flags to kubectl', () => {
    expect(parseCliArguments(['-h'], program())).toEqual({ mode: 'run', argv: ['-h'], renewCache: false });
    expect(parseCliArguments(['-V'], program())).toEqual({ mode: 'run', argv: ['-V'], renewCache: false });
    expect(output).toEqual([]);
  });

  it('should recognize --init', () => {
    expect(parseCliArguments(['--init'], program())).toEqual({ mode: 'init' });
  });

  it('should recognize --store-clusters-contexts with its pattern', () => {
    expect(parseCliArguments(['--store-clusters-contexts', 'prod-'], program())).toEqual({
      mode: 'store-context',
      pattern: 'prod-',
    });
  });

  it('should recognize --set-clusters-contexts with its name', () => {
    expect(parseCliArguments(['--set-clusters-contexts', 'production'], program())).toEqual({
      mode: 'set-default',
      name: 'production',
    });
  });

  it('should select a context when there are no arguments', () => {
    expect(parseCliArguments([], program())).toEqual({ mode: 'select-context' });
  });

  it('should pass the rest through after --renew-cache', () => {
    expect(parseCliArguments(['--renew-cache', 'get', 'pods', '-n', 'apps'], program())).toEqual({
      mode: 'run',
      argv: ['get', 'pods', '-n', 'apps'],
      renewCache: true,
    });
  });

  it('should reject a flag that is missing its value', () => {
    expect(() => parseCliArguments(['--store-clusters-contexts'], program())).toThrow(
      "option '--store-clusters-contexts <pattern>' argument missing",
    );
  });

  it('should print the version', () => {
    expect(() => parseCliArguments(['--version'], program())).toThrow('1.2.3');
    expect(output).toEqual(['1.2.3\n']);
  });
});
