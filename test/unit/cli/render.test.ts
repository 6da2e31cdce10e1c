import { formatTable, renderResults, sortRowsByCluster } from '@/cli/render';
import { createCapturingLogger, LEVELS } from '../../__support__/utilities/logger';

describe('render', () => {
  describe('formatTable', () => {
    it('should pad columns to the widest cell with a two-space gap', () => {
      const lines = formatTable([
        ['prod-eks-1', 'web-1', '1/1', 'Running', '0', '5d'],
        ['dev', 'web-2', '0/1', 'CrashLoopBackOff', '12', '(3m ago)   5d'],
      ]);

      expect(lines).toEqual([
        'CLUSTER     NAME   READY  STATUS            RESTARTS  AGE',
        'prod-eks-1  web-1  1/1    Running           0         5d',
        'dev         web-2  0/1    CrashLoopBackOff  12        (3m ago)   5d',
      ]);
    });

    it('should handle short rows and add blank headers for wide ones', () => {
      const lines = formatTable([
        ['c1', 'ns-a', 'Active', '10d'],
        ['c1', 'x', 'y', 'z', 'w', 'v', 'extra'],
      ]);

      expect(lines).toEqual([
        'CLUSTER  NAME  READY   STATUS  RESTARTS  AGE',
        'c1       ns-a  Active  10d',
        'c1       x     y       z       w         v    extra',
      ]);
    });
  });

  describe('sortRowsByCluster', () => {
    it('should order table rows by cluster and keep each cluster in arrival order', () => {
      const rows = [
        ['b', 'pod-1'],
        ['a', 'pod-2'],
        ['b', 'pod-3'],
        ['a', 'pod-4'],
      ];

      expect(sortRowsByCluster(rows, 'get')).toEqual([
        ['a', 'pod-2'],
        ['a', 'pod-4'],
        ['b', 'pod-1'],
        ['b', 'pod-3'],
      ]);
      expect(rows[0]).toEqual(['b', 'pod-1']);
    });

    it('should order log rows by the cluster in the first bracket', () => {
      const rows = [
        ['[b][2024-01-05 03:04:09] one'],
        ['[a][2024-01-05 03:04:10] two'],
        ['[b][2024-01-05 03:04:08] three'],
      ];

      expect(sortRowsByCluster(rows, 'logs')).toEqual([
        ['[a][2024-01-05 03:04:10] two'],
        ['[b][2024-01-05 03:04:09] one'],
        ['[b][2024-01-05 03:04:08] three'],
      ]);
    });
  });

  describe('renderResults', () => {
    it('should log a notice and print nothing for an empty result', () => {
      const { logger, messages } = createCapturingLogger();
      const written: string[] = [];

      renderResults([], 'get', { logger, write: (line) => written.push(line) });

      expect(written).toEqual([]);
      expect(messages(LEVELS.info)).toEqual(['No data returned from the kubectl command.']);
    });

    it('should print log rows as they are', () => {
      const { logger } = createCapturingLogger();
      const written: string[] = [];

      renderResults([['[b][t] x'], ['[a][t] y']], 'logs', { logger, write: (line) => written.push(line) });

      expect(written).toEqual(['[b][t] x', '[a][t] y']);
    });

    it('should sort only when asked', () => {
      const { logger } = createCapturingLogger();
      const written: string[] = [];

      renderResults([['[b][t] x'], ['[a][t] y']], 'logs', {
        logger,
        sortByCluster: true,
        write: (line) => written.push(line),
      });

      expect(written).toEqual(['[a][t] y', '[b][t] x']);
    });

    it('should print a table for other commands', () => {
      const { logger } = createCapturingLogger();
      const written: string[] = [];

      renderResults([['c1', 'web-1', '1/1', 'Running', '0', '5d']], 'get', {
        logger,
        write: (line) => written.push(line),
      });

      expect(written).toEqual([
        'CLUSTER  NAME   READY  STATUS   RESTARTS  AGE',
        'c1       web-1  1/1    Running  0         5d',
      ]);
    });
  });
});
