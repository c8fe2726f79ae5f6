import { useEffect, useState } from 'react';
import { MAX_PARAMETER_LENGTH, difficulties } from '../constants';
import { isDigitCharacter } from '../settings';
import type { DifficultyKey } from '../types';

interface SettingsPanelProps {
  difficulty: DifficultyKey;
  rows: number;
  cols: number;
  mines: number;
  onDifficulty: (key: DifficultyKey) => void;
  onRows: (value: string) => number;
  onCols: (value: string) => number;
  onMines: (value: string) => number;
}

interface ParameterFieldProps {
  label: string;
  value: number;
  disabled: boolean;
  onCommit: (value: string) => number;
}

function ParameterField({ label, value, disabled, onCommit }: ParameterFieldProps) {
  const [draft, setDraft] = useState(String(value));

  useEffect(() => {
    setDraft(String(value));
  }, [value]);

  const commit = () => {
    if (disabled || draft === String(value)) return;
    setDraft(String(onCommit(draft)));
  };

  return (
    <label className="flex items-center justify-between gap-3 text-sm font-semibold">
      <span className="uppercase tracking-[0.2em] text-[11px] text-[#4b4b4b]">{label}</span>
      <input
        value={draft}
        disabled={disabled}
        inputMode="numeric"
        maxLength={MAX_PARAMETER_LENGTH}
        onChange={(e) => setDraft([...e.target.value].filter(isDigitCharacter).join('').slice(0, MAX_PARAMETER_LENGTH))}
        onBlur={commit}
        onKeyDown={(e) => {
          if (e.key === 'Enter') commit();
        }}
        className="w-20 border-[3px] border-[#121212] bg-[#f6efdd] px-2 py-1 text-right font-mono disabled:opacity-50"
      />
    </label>
  );
}

export function SettingsPanel({ difficulty, rows, cols, mines, onDifficulty, onRows, onCols, onMines }: SettingsPanelProps) {
  const isCustom = difficulty === 'CUSTOM';
  return (
    <section className="border-[4px] border-[#121212] bg-[#f2ead7] p-4 shadow-[6px_6px_0_#121212] space-y-4">
      <div className="text-xs uppercase tracking-[0.2em] text-[#4b4b4b]">Difficulty</div>
      <div className="grid grid-cols-2 gap-2">
        {difficulties.map((d) => (
          <button
            key={d.key}
            type="button"
            onClick={() => onDifficulty(d.key)}
            className={`px-3 py-2 border-[3px] text-left transition ${
              d.key === difficulty
                ? 'border-[#121212] bg-[#0062ad] text-[#f4ecd8] shadow-[4px_4px_0_#121212]'
                : 'border-[#121212] bg-[#f6efdd] text-[#222] hover:bg-[#efe4ca]'
            }`}
          >
            <div className="text-sm font-semibold">{d.label}</div>
            {d.key !== 'CUSTOM' && (
              <div className="text-xs opacity-70">
                {d.cols} x {d.rows} · {d.mines}
              </div>
            )}
          </button>
        ))}
      </div>
      <div className="space-y-2">
        <ParameterField label="Width" value={cols} disabled={!isCustom} onCommit={onCols} />
        <ParameterField label="Height" value={rows} disabled={!isCustom} onCommit={onRows} />
        <ParameterField label="Mines" value={mines} disabled={!isCustom} onCommit={onMines} />
      </div>
    </section>
  );
}
