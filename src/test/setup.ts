import { LogLevel, setLogLevel } from '@/lib/logger';

// Geometry traces and recoverable warnings are noise in test output
setLogLevel(LogLevel.SILENT);
