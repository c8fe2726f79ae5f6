import Phaser from 'phaser';
import { BoardView, SPRITE_KEYS, pointerToCell, type BoardPointerEvent } from '../gui';
import { defaultMinesweeperConfig, MinesweeperSceneConfig } from './config';
import { BoardFrame, MinesweeperEvents } from './types';

export class MinesweeperScene extends Phaser.Scene {
  private cfg: MinesweeperSceneConfig;
  private eventsBridge: MinesweeperEvents;
  private view: BoardView;
  private tiles: Phaser.GameObjects.Image[][] = [];
  private gridLines!: Phaser.GameObjects.Graphics;
  private frameState: BoardFrame | null = null;
  private ready = false;
  private failed = false;

  constructor(config?: Partial<MinesweeperSceneConfig>, eventsBridge: MinesweeperEvents = {}) {
    super('MinesweeperScene');
    this.cfg = { ...defaultMinesweeperConfig, ...config };
    this.eventsBridge = eventsBridge;
    this.view = new BoardView({ originX: 0, originY: 0, tileSize: this.cfg.tileSize, rows: 0, cols: 0 });
  }

  preload() {
    const size = this.cfg.tileSize;
    this.load.on(Phaser.Loader.Events.FILE_LOAD_ERROR, (file: Phaser.Loader.File) => {
      this.failed = true;
      this.eventsBridge.onFatalError?.(`Cannot load sprite "${file.key}" from ${this.cfg.assetPath}`);
    });
    for (const key of SPRITE_KEYS) {
      this.load.svg(key, `${this.cfg.assetPath}/${key}.svg`, { width: size, height: size });
    }
  }

  create() {
    if (this.failed) return;
    this.input.mouse?.disableContextMenu();
    this.gridLines = this.add.graphics().setDepth(1);
    this.input.on('pointerdown', (pointer: Phaser.Input.Pointer) => this.handlePointer(pointer, 'down'));
    this.input.on('pointerup', (pointer: Phaser.Input.Pointer) => this.handlePointer(pointer, 'up'));
    this.input.on('pointermove', (pointer: Phaser.Input.Pointer) => {
      if (pointer.leftButtonDown()) this.emitPress(pointer);
    });
    this.input.on('gameout', () => this.eventsBridge.onPress?.(null));
    this.ready = true;
    if (this.frameState) this.renderBoard(this.frameState);
  }

  /** Draws a board snapshot, rebuilding the tile grid when the dimensions change. */
  renderBoard(frame: BoardFrame) {
    this.frameState = frame;
    if (!this.ready || this.failed) return;

    const { tileSize } = this.cfg;
    if (this.tiles.length !== frame.rows || this.tiles[0]?.length !== frame.cols) {
      this.buildGrid(frame.rows, frame.cols);
    }

    const sprites = this.view.render(frame);
    sprites.forEach((row, r) =>
      row.forEach((key, c) => {
        const image = this.tiles[r]?.[c];
        if (image && image.texture.key !== key) image.setTexture(key);
      })
    );
    this.scale.resize(frame.cols * tileSize, frame.rows * tileSize);
  }

  private buildGrid(rows: number, cols: number) {
    const { tileSize, colors } = this.cfg;
    this.tiles.flat().forEach((image) => image.destroy());
    this.tiles = Array.from({ length: rows }, (_, r) =>
      Array.from({ length: cols }, (_, c) =>
        this.add.image(c * tileSize, r * tileSize, 'tile').setOrigin(0).setDepth(0)
      )
    );
    this.view.setLayout({ originX: 0, originY: 0, tileSize, rows, cols });

    this.gridLines.clear();
    this.gridLines.lineStyle(1, colors.grid, 1);
    for (let r = 0; r <= rows; r++) {
      this.gridLines.lineBetween(0, r * tileSize, cols * tileSize, r * tileSize);
    }
    for (let c = 0; c <= cols; c++) {
      this.gridLines.lineBetween(c * tileSize, 0, c * tileSize, rows * tileSize);
    }
  }

  private emitPress(pointer: Phaser.Input.Pointer) {
    this.eventsBridge.onPress?.(pointerToCell(pointer.x, pointer.y, this.view.getLayout()));
  }

  private handlePointer(pointer: Phaser.Input.Pointer, kind: BoardPointerEvent['kind']) {
    const button = pointer.button === 2 ? 'secondary' : 'primary';
    if (button === 'primary') {
      if (kind === 'down') this.emitPress(pointer);
      else this.eventsBridge.onPress?.(null);
    }
    const command = this.view.handleEvent({ kind, button, x: pointer.x, y: pointer.y });
    if (command) this.eventsBridge.onCommand?.(command);
  }
}
