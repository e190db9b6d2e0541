import { ScheduleResolution, ScheduleStatus } from '../interfaces/ScheduleInstaller';

export interface Reconciliation {
  status: ScheduleStatus;

  /** Table to write back; null when nothing has to be written */
  table: string | null;
}

/**
 * `<schedule> <command>`; `%` is a line break to cron and gets escaped
 */
export function composeCronLine(schedule: string, command: string): string {
  return `${schedule.trim()} ${command.replace(/%/g, '\\%')}`;
}

export function findMarkedLines(table: string, marker: string): string[] {
  return table.split('\n').filter(line => line.includes(marker));
}

function appendLine(table: string, line: string): string {
  const base = table === '' || table.endsWith('\n') ? table : `${table}\n`;
  return `${base}${line}\n`;
}

function replaceMarkedLines(table: string, line: string, marker: string): string {
  const kept = table.split('\n').filter(existing => !existing.includes(marker));
  while (kept.length > 0 && kept[kept.length - 1].trim() === '') {
    kept.pop();
  }
  kept.push(line);
  return `${kept.join('\n')}\n`;
}

/**
 * Merge `line` into the current crontab.
 * `resolution` decides what happens to lines already carrying `marker`; it defaults to replace.
 */
export function reconcileCrontab(
  current: string,
  line: string,
  marker: string,
  resolution: ScheduleResolution = 'replace'
): Reconciliation {
  if (findMarkedLines(current, marker).length > 0) {
    switch (resolution) {
      case 'cancel':
        return { status: 'cancelled', table: null };
      case 'add':
        return { status: 'added', table: appendLine(current, line) };
      case 'replace':
        return { status: 'replaced', table: replaceMarkedLines(current, line, marker) };
    }
  }

  if (current.split('\n').some(existing => existing.trim() === line.trim())) {
    return { status: 'unchanged', table: null };
  }

  return { status: 'installed', table: appendLine(current, line) };
}
