import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['FUZZRANK_HOME'] =
	process.env['FUZZRANK_HOME'] ??
	path.join(os.tmpdir(), `fuzzrank-test-home-${process.pid}`);

// Ignore the developer's own log level.
delete process.env['FUZZRANK_LOG_LEVEL'];
