import { Flag, RotateCcw, Timer, Trophy } from 'lucide-react';
import { STATUS_TEXT } from '../constants';
import type { GameStatus } from '../types';

interface StatusPanelProps {
  seconds: number;
  minesLeft: number;
  status: GameStatus;
  onRestart: () => void;
  onLeaderboard: () => void;
}

/** Three-digit counter; negative values keep the sign in the first digit. */
export const formatCounter = (value: number): string => {
  const clamped = Math.max(-99, Math.min(999, Math.trunc(value)));
  return clamped < 0 ? `-${String(-clamped).padStart(2, '0')}` : String(clamped).padStart(3, '0');
};

const statusColor: Record<GameStatus, string> = {
  ready: 'text-[#222]',
  playing: 'text-[#0062ad]',
  won: 'text-[#1f6b40]',
  lost: 'text-[#8d1f2f]'
};

export function StatusPanel({ seconds, minesLeft, status, onRestart, onLeaderboard }: StatusPanelProps) {
  return (
    <section className="border-[4px] border-[#121212] bg-[#f2ead7] p-4 shadow-[6px_6px_0_#121212] space-y-4">
      <div className="grid grid-cols-2 gap-3">
        <div className="border-[3px] border-[#121212] bg-[#121212] px-3 py-2 text-[#f4ecd8]">
          <div className="flex items-center gap-2 text-[10px] uppercase tracking-[0.2em] opacity-70">
            <Timer size={12} />
            Time
          </div>
          <div className="font-mono text-2xl font-black">{formatCounter(seconds)}</div>
        </div>
        <div className="border-[3px] border-[#121212] bg-[#121212] px-3 py-2 text-[#f4ecd8]">
          <div className="flex items-center gap-2 text-[10px] uppercase tracking-[0.2em] opacity-70">
            <Flag size={12} />
            Mines
          </div>
          <div className="font-mono text-2xl font-black">{formatCounter(minesLeft)}</div>
        </div>
      </div>

      <div className={`text-center text-lg font-black tracking-wide ${statusColor[status]}`}>{STATUS_TEXT[status]}</div>

      <div className="grid grid-cols-2 gap-3">
        <button
          type="button"
          onClick={onRestart}
          className="flex items-center justify-center gap-2 border-[3px] border-[#121212] bg-[#121212] py-2 text-sm font-semibold text-[#f2ead7] shadow-[4px_4px_0_#0d477a]"
        >
          <RotateCcw size={16} />
          Restart
        </button>
        <button
          type="button"
          onClick={onLeaderboard}
          className="flex items-center justify-center gap-2 border-[3px] border-[#121212] bg-[#f6efdd] py-2 text-sm font-semibold text-[#222] transition hover:bg-[#efe4ca]"
        >
          <Trophy size={16} />
          Leaderboard
        </button>
      </div>
    </section>
  );
}
