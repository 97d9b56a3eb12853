import { formatTime } from '../clock.js';

export function formatDuration(minutes: number): string {
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function loginMessage(name: string, loginTime: Date): string {
  return `Hi ${name},\n\nYou have successfully signed in at ${formatTime(loginTime)}.\n\nHave a productive day! 🚀`;
}

export function logoutMessage(name: string, logoutTime: Date, workMinutes: number | null): string {
  let message = `Hi ${name},\n\nYou have signed out at ${formatTime(logoutTime)}.`;

  if (workMinutes !== null) {
    message += `\n\nToday's work duration: ${formatDuration(workMinutes)}.`;
  }

  return `${message}\n\nHave a good evening! 🌙`;
}
