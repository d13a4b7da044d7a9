import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('should default to log and above', () => {
    expect(resolveLogLevels()).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('should treat info as log', () => {
    expect(resolveLogLevels('info')).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('should include everything for verbose', () => {
    expect(resolveLogLevels('verbose')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
  });

  it('should narrow to errors', () => {
    expect(resolveLogLevels(' ERROR ')).toEqual(['fatal', 'error']);
  });

  it('should fall back to log for unknown levels', () => {
    expect(resolveLogLevels('chatty')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
