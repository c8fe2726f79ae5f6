import { Trophy } from 'lucide-react';
import { LEADERBOARD_SIZE, RANKED_DIFFICULTIES, getDifficulty } from '../constants';
import type { LeaderboardRow } from '../leaderboard';

interface LeaderboardPanelProps {
  rows: LeaderboardRow[];
  onClose: () => void;
}

export function LeaderboardPanel({ rows, onClose }: LeaderboardPanelProps) {
  return (
    <div
      role="dialog"
      onClick={onClose}
      className="fixed inset-0 z-40 flex cursor-pointer items-center justify-center bg-[#0a2540]/35 backdrop-blur-[2px]"
    >
      <div className="w-full max-w-3xl border-[6px] border-sweeper-ink bg-sweeper-paper p-6 shadow-block">
        <div className="flex items-center gap-3 text-2xl font-black">
          <Trophy />
          LEADERBOARD
        </div>
        <div className="mt-6 grid gap-4 md:grid-cols-3">
          {RANKED_DIFFICULTIES.map((difficulty) => {
            const entries = rows.filter((row) => row.difficulty === difficulty);
            return (
              <div key={difficulty} className="border-[3px] border-[#121212] bg-[#f6efdd] p-3">
                <div className="text-xs uppercase tracking-[0.2em] text-[#4b4b4b]">{getDifficulty(difficulty).label}</div>
                <ol className="mt-3 space-y-1 font-mono text-sm">
                  {Array.from({ length: LEADERBOARD_SIZE }, (_, i) => {
                    const entry = entries[i];
                    return (
                      <li key={i} className="flex justify-between">
                        <span>
                          {i + 1}. {entry ? entry.name : '---'}
                        </span>
                        <span>{entry ? entry.time : ''}</span>
                      </li>
                    );
                  })}
                </ol>
              </div>
            );
          })}
        </div>
        <div className="mt-6 text-center text-xs uppercase tracking-[0.2em] text-[#4b4b4b]">Click anywhere to continue</div>
      </div>
    </div>
  );
}
