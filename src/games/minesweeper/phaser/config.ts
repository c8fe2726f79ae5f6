import Phaser from 'phaser';
import { TILE_SIZE } from '../constants';
import type { MinesweeperScene } from './MinesweeperScene';

export type MinesweeperSceneConfig = {
  tileSize: number;
  assetPath: string;
  colors: {
    bg: number;
    grid: number;
  };
};

export const defaultMinesweeperConfig: MinesweeperSceneConfig = {
  tileSize: TILE_SIZE,
  assetPath: '/assets/minesweeper',
  colors: {
    bg: 0xd7dcdc,
    grid: 0x738383
  }
};

export function createPhaserConfig(
  parent: HTMLElement,
  scene: MinesweeperScene,
  size: { width: number; height: number },
  cfg: MinesweeperSceneConfig = defaultMinesweeperConfig
): Phaser.Types.Core.GameConfig {
  return {
    type: Phaser.CANVAS,
    width: size.width,
    height: size.height,
    parent,
    backgroundColor: cfg.colors.bg,
    scale: {
      mode: Phaser.Scale.NONE,
      autoCenter: Phaser.Scale.CENTER_BOTH
    },
    audio: { noAudio: true },
    banner: false,
    scene
  };
}
