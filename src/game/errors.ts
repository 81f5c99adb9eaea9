/**
 * Thrown when game code is called in a way the move validator should have
 * already ruled out: coordinates off the board, a computer move on a full board
 * or onto an occupied cell. Never a user-facing rejection.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}
