import { logger } from '@/services/utils/logger';

// Entries still reach getLogs()
logger.setConsoleEnabled(false);
