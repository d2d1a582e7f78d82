import { FrameObserver, SimulationFrame } from '@simulation/application/ports/FrameObserver';
import { SimulationEvent } from '@simulation/domain/SimulationEvent';

function decisions(event: SimulationEvent): string {
  const { facts } = event;
  const tags: string[] = [];
  if (facts.natural) tags.push('natural');
  if (facts.craps) tags.push('craps');
  if (facts.pointEstablished !== undefined) tags.push(`point ${facts.pointEstablished}`);
  if (facts.completedPoint) tags.push('point made');
  if (facts.sevenOut) tags.push('seven-out');
  return tags.length > 0 ? tags.join(', ') : 'no decision';
}

/** One line per settled roll; other stages render nothing. */
export function renderFrameLine(frame: SimulationFrame): string | null {
  const { event } = frame;
  if (frame.stage !== 'after_payouts' || !event) return null;

  const { die1, die2, total } = event.outcome;
  return (
    `#${event.rollIndex} [${event.facts.phaseBefore}] shooter ${event.shooterIndex + 1} ` +
    `rolled ${die1}+${die2}=${total}: ${decisions(event)} | bankrolls ${event.bankrolls.join(' ')}`
  );
}

/** Frame observer that prints each settled roll. */
export function consoleFrameObserver(write: (line: string) => void): FrameObserver {
  return (frame) => {
    const line = renderFrameLine(frame);
    if (line !== null) write(line);
  };
}
