import { QueryFailedError } from 'typeorm';
import { isUniqueViolation } from './unique-violation';

function queryError(code: string) {
  return new QueryFailedError('INSERT INTO attendance ...', [], Object.assign(new Error(code), { code }));
}

describe('isUniqueViolation', () => {
  it('recognizes duplicate key errors', () => {
    expect(isUniqueViolation(queryError('ER_DUP_ENTRY'))).toBe(true);
    expect(isUniqueViolation(queryError('SQLITE_CONSTRAINT_UNIQUE'))).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isUniqueViolation(queryError('ER_LOCK_DEADLOCK'))).toBe(false);
    expect(isUniqueViolation(new Error('ER_DUP_ENTRY'))).toBe(false);
  });
});
