import { useState } from 'react';
import { MAX_NAME_LENGTH } from '../constants';
import { isNameCharacter } from '../settings';

interface NameInputDialogProps {
  time: number;
  onSubmit: (name: string) => boolean;
}

export function NameInputDialog({ time, onSubmit }: NameInputDialogProps) {
  const [name, setName] = useState('');

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-[#0a2540]/35 backdrop-blur-[2px]">
      <form
        onSubmit={(e) => {
          e.preventDefault();
          onSubmit(name);
        }}
        className="w-full max-w-md border-[6px] border-[#121212] bg-[#f2ead7] p-6 shadow-[8px_8px_0_#121212]"
      >
        <div className="text-xs uppercase tracking-[0.2em] text-[#4d4d4d]">New record</div>
        <div className="mt-3 text-2xl font-black text-[#1f6b40]">YOUR TIME IS {time} SECONDS!</div>
        <div className="mt-4 text-sm text-[#2d2d2d]">ENTER YOUR NAME:</div>
        <input
          autoFocus
          value={name}
          maxLength={MAX_NAME_LENGTH}
          onChange={(e) => setName([...e.target.value].filter(isNameCharacter).join('').slice(0, MAX_NAME_LENGTH))}
          className="mt-2 w-full border-[3px] border-[#121212] bg-[#f6efdd] px-3 py-2 font-mono text-lg"
        />
        <button
          type="submit"
          disabled={!name}
          className="mt-4 w-full border-[3px] border-[#121212] bg-[#121212] py-2 font-semibold text-[#f2ead7] disabled:opacity-50"
        >
          Save
        </button>
      </form>
    </div>
  );
}
