import { escapeLike } from './sql-like.util';

describe('escapeLike', () => {
  it('should escape LIKE wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('should leave ordinary text alone', () => {
    expect(escapeLike('ENG-')).toBe('ENG-');
  });
});
