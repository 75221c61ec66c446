export const NOTIFIER_TOKEN = 'INotifier';

/** SchedulerRegistry name of the monitor tick interval */
export const MONITOR_TICK_INTERVAL = 'ratioMonitorTick';
