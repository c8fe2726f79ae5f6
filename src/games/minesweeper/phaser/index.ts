import Phaser from 'phaser';
import { MinesweeperScene } from './MinesweeperScene';
import { createPhaserConfig, defaultMinesweeperConfig, MinesweeperSceneConfig } from './config';
import { BoardFrame, MinesweeperEvents } from './types';

export interface MinesweeperGameHandle {
  game: Phaser.Game;
  scene: MinesweeperScene;
  destroy: () => void;
  render: (frame: BoardFrame) => void;
}

export function createMinesweeperGame(
  parent: HTMLElement,
  initial: BoardFrame,
  events: MinesweeperEvents = {},
  cfg?: Partial<MinesweeperSceneConfig>
): MinesweeperGameHandle {
  const sceneConfig = { ...defaultMinesweeperConfig, ...cfg };
  const scene = new MinesweeperScene(sceneConfig, events);
  const size = {
    width: initial.cols * sceneConfig.tileSize,
    height: initial.rows * sceneConfig.tileSize
  };
  const config = createPhaserConfig(parent, scene, size, sceneConfig);
  const game = new Phaser.Game(config);
  scene.renderBoard(initial);
  return {
    game,
    scene,
    destroy: () => game.destroy(true),
    render: (frame) => scene.renderBoard(frame)
  };
}

export type { MinesweeperEvents, BoardFrame, MinesweeperSceneConfig };
