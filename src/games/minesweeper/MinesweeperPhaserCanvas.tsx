import { useEffect, useRef } from 'react';
import { createMinesweeperGame, BoardFrame, MinesweeperEvents } from './phaser';
import { useMinesweeperStore, type MinesweeperState } from './useMinesweeperStore';

const toFrame = (state: MinesweeperState): BoardFrame => ({
  cells: state.cells,
  status: state.status,
  explodedAt: state.explodedAt,
  pressed: state.pressed,
  rows: state.rows,
  cols: state.cols
});

export function MinesweeperPhaserCanvas() {
  const containerRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    if (!containerRef.current) return;
    const store = useMinesweeperStore;
    const events: MinesweeperEvents = {
      onCommand: (command) => store.getState().dispatch(command),
      onPress: (point) => store.getState().setPressed(point),
      onFatalError: (message) => store.getState().reportFatal(message)
    };
    const gameHandle = createMinesweeperGame(containerRef.current, toFrame(store.getState()), events);

    const unsubscribe = store.subscribe((state, prev) => {
      if (
        state.cells !== prev.cells ||
        state.pressed !== prev.pressed ||
        state.status !== prev.status ||
        state.rows !== prev.rows ||
        state.cols !== prev.cols
      ) {
        gameHandle.render(toFrame(state));
      }
    });

    return () => {
      unsubscribe();
      gameHandle.destroy();
    };
  }, []);

  return <div ref={containerRef} className="touch-none select-none" />;
}
