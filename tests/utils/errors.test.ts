import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ChangeFailedError,
  DaemonError,
  PackageNotFoundError,
  PreconditionError,
  ValidationError,
  handleError
} from '../../src/utils/errors.js';
import { ErrorCodes, PkgdeckError } from '../../src/types/index.js';

describe('error types', () => {
  it('carry codes and details', () => {
    const notFound = new PackageNotFoundError('ghost');
    assert.ok(notFound instanceof PkgdeckError);
    assert.equal(notFound.code, ErrorCodes.PACKAGE_NOT_FOUND);
    assert.equal(notFound.message, "Package 'ghost' not found");
    assert.deepEqual(notFound.details, { packageName: 'ghost' });

    const precondition = new PreconditionError('busy', { packageName: 'foo' });
    assert.equal(precondition.code, ErrorCodes.PRECONDITION_FAILED);
    assert.equal(precondition.name, 'PreconditionError');
  });

  it('keep daemon and change context', () => {
    const daemon = new DaemonError('snap not installed', 'snap-not-found', 404);
    assert.equal(daemon.kind, 'snap-not-found');
    assert.equal(daemon.statusCode, 404);
    assert.deepEqual(daemon.details, { kind: 'snap-not-found', statusCode: 404 });

    const failed = new ChangeFailedError('7', 'boom');
    assert.equal(failed.changeId, '7');
    assert.equal(failed.code, ErrorCodes.CHANGE_FAILED);
    assert.equal(failed.kind, undefined);
  });
});

describe('handleError', () => {
  it('reports the message of project and plain errors', () => {
    assert.deepEqual(handleError(new ValidationError('bad key')), {
      success: false,
      error: 'Validation error: bad key'
    });
    assert.deepEqual(handleError(new Error('plain')), { success: false, error: 'plain' });
  });

  it('reports non-errors generically', () => {
    assert.deepEqual(handleError('oops'), { success: false, error: 'An unknown error occurred' });
  });
});
