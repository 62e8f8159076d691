import { isAbortError, logger } from '@switchboard/shared';
import { main } from './app.js';

const log = logger.child({ module: 'console' });

main().catch((err: unknown) => {
  if (isAbortError(err)) {
    log.warn('canceled');
    process.exit(130);
  }
  log.fatal({ err }, 'console failed');
  process.exit(1);
});
