import { LeaderboardRow, RoundBoard, ScoreReport } from './types';

/**
 * Render the leaderboard to the terminal.
 * Uses plain text formatting with aligned columns.
 */
export function renderLeaderboard(rows: LeaderboardRow[], title = 'Leaderboard'): string {
  const lines: string[] = [];
  const nameWidth = Math.max(6, ...rows.map(r => r.name.length)) + 2;
  const width = 6 + nameWidth + 10 + 12;
  const divider = '═'.repeat(width);

  lines.push(divider);
  lines.push(centerText(title, width));
  lines.push(divider);
  lines.push(pad('Rank', 6) + pad('Name', nameWidth) + pad('Score', 10) + pad('Max', 12));
  lines.push('─'.repeat(width));

  if (rows.length === 0) {
    lines.push('  No scored participants.');
  }
  for (const row of rows) {
    lines.push(
      pad(String(row.rank), 6) +
      pad(row.name, nameWidth) +
      pad(String(row.score), 10) +
      pad(String(row.maxScore), 12)
    );
  }

  lines.push(divider);
  return lines.join('\n');
}

/**
 * Render one participant's per-round score report.
 */
export function renderScoreReport(report: ScoreReport): string {
  const lines: string[] = [];
  const divider = '='.repeat(45);

  lines.push(divider);
  lines.push(`  SCORE REPORT FOR: ${report.participantName}`);
  lines.push(divider);
  for (const round of report.rounds) {
    lines.push(`${pad(round.roundName + ':', 16)} ${round.correct} correct picks (+${round.points} pts)`);
  }
  lines.push('-'.repeat(45));
  lines.push(`${pad('TOTAL SCORE:', 16)} ${report.totalScore} points`);
  lines.push(`${pad('MAX POSSIBLE:', 16)} ${report.maxScore} points`);
  lines.push(divider);

  return lines.join('\n');
}

/**
 * Render the per-round board: one column per participant, one row per round.
 */
export function renderRoundBoard(board: RoundBoard): string {
  const colWidth = board.participants.length > 0
    ? Math.max(...board.participants.map(n => n.length)) + 2
    : 10;
  const header = pad('ROUND', 16) + '|' + board.participants.map(n => pad(n.toUpperCase(), colWidth)).join('');
  const divider = '-'.repeat(header.length);

  const lines: string[] = ['--- Tournament Scoreboard ---', header, divider];
  for (const round of board.rounds) {
    lines.push(pad(round.roundName, 16) + '|' + round.points.map(p => pad(`${p} pts`, colWidth)).join(''));
  }
  lines.push(divider);
  lines.push(pad('TOTAL SCORE', 16) + '|' + board.totals.map(t => pad(String(t), colWidth)).join(''));
  lines.push(divider);

  return lines.join('\n');
}

function pad(str: string, width: number): string {
  return str.padEnd(width);
}

function centerText(text: string, width: number): string {
  const padding = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(padding) + text;
}
