import { slotForInstant } from '@/lib/block-calendar';
import { BlockSessions, BlockSync } from '@/lib/blocks';
import { CheckInCounter } from '@/lib/check-in';
import { createLogger } from '@/lib/log';
import { RecoveryCoordinator } from '@/lib/recovery';
import { validateSettings } from '@/lib/settings';
import { TimerEngine } from '@/lib/timer';
import {
  JsonFileBlockRepository,
  TimeoutNotificationScheduler,
  createProcessLifecycle,
  loadSettingsFile,
} from '@/host';
import { describeView } from '@/timer-view/format';

const SETTINGS_PATH = process.env.BLOCKS_SETTINGS ?? 'settings.json';
const DATA_DIR = process.env.BLOCKS_DATA_DIR ?? '.blocks';

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

async function setup() {
  const settings = await loadSettingsFile(SETTINGS_PATH);
  const log = createLogger('blocks', settings.logLevel);

  const { valid, errors } = validateSettings(settings);
  if (!valid) {
    throw new Error(`Invalid settings in ${SETTINGS_PATH}: ${errors.join('; ')}`);
  }

  const notifications = new TimeoutNotificationScheduler((blockIndex, isBreak) => {
    log.info(`${isBreak ? 'Break' : 'Block'} ${blockIndex} is over`);
  });
  const engine = new TimerEngine({
    settings,
    notifications,
    checkIn: new CheckInCounter(settings.checkInThreshold),
    logger: createLogger('timer', settings.logLevel),
  });
  const repository = new JsonFileBlockRepository(DATA_DIR);
  const sync = new BlockSync(engine, repository, {
    logger: createLogger('blocks-sync', settings.logLevel),
    dayStartHour: settings.dayStartHour,
  });
  const sessions = new BlockSessions(engine, sync, {
    logger: createLogger('blocks', settings.logLevel),
    dayStartHour: settings.dayStartHour,
  });
  const recovery = new RecoveryCoordinator(engine, {
    logger: createLogger('recovery', settings.logLevel),
    dayStartHour: settings.dayStartHour,
  });
  const lifecycle = createProcessLifecycle();

  sync.attach();
  const detachSessions = sessions.attach();
  const detachLifecycle = recovery.attach(lifecycle);

  // Status line on every state change and once a minute while running
  let lastStatus = '';
  engine.subscribe((view) => {
    const changed = view.status !== lastStatus;
    lastStatus = view.status;
    if (changed || (view.status === 'running' && view.timeLeft % 60 === 0)) {
      log.info(describeView(view, settings.dayStartHour));
    }
  });

  engine.on('breakNotify', () => {
    log.info('Break reminder: time to get back to work?');
  });
  engine.on('checkInRequired', (count) => {
    log.warn(`Paused auto-continue after ${count} blocks in a row. Restart to keep going.`);
  });
  engine.on('pausedExpiry', (completion) => {
    log.warn(`Block ${completion.blockIndex} ended while paused after ${completion.secondsUsed}s`);
  });

  // Pick up where a lost process left off, or start on the current block
  const now = new Date();
  const slot = slotForInstant(now, settings.dayStartHour);
  const blocks = await repository.load(slot.date);
  const current = blocks.find((b) => b.blockIndex === slot.index);
  const snapshot = current?.activeRunSnapshot ?? null;

  const resumed = snapshot !== null && recovery.resumeFromSnapshot(snapshot) === 'resumed';
  if (!resumed) {
    await sessions.startCurrent();
  }

  await sessions.checkSlot();

  process.on('SIGINT', () => {
    engine.stop(true);
    notifications.cancelAll();
    detachSessions();
    detachLifecycle();
    lifecycle.dispose();
    sessions
      .flush()
      .then(() => sync.flush())
      .catch(console.error)
      .finally(() => {
        engine.destroy();
        process.exit(0);
      });
  });
}

setup().catch(console.error);
