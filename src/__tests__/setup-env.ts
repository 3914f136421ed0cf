// Keep test output free of diagnostics and colour codes
process.env.LOG_LEVEL = 'error';
process.env.FORCE_COLOR = '0';
