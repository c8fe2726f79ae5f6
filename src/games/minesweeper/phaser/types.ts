import type { BoardViewState } from '../gui';
import type { BoardCommand, Point } from '../types';

export interface MinesweeperEvents {
  onCommand?: (command: BoardCommand) => void;
  onPress?: (point: Point | null) => void;
  onFatalError?: (message: string) => void;
}

export type BoardFrame = BoardViewState & {
  rows: number;
  cols: number;
};
