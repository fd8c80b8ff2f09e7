/**
 * Vitest setup file
 * Runs before every test file, ahead of any module that creates the logger singleton
 */

process.env.GPGPIPE_FILE_LOGGING = 'false';
process.env.LOG_LEVEL = 'error';
