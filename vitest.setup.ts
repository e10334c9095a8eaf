import { setConsoleOutput } from '@core/logger';

// Keep test output readable; entries still land in the log buffer.
setConsoleOutput(false);
