import { lazy, Suspense, useEffect } from 'react';
import { AlertTriangle } from 'lucide-react';
import { DELAY_BEFORE_NAME_INPUT_MS } from './constants';
import { keyToShortcut } from './gui';
import { LeaderboardPanel } from './components/LeaderboardPanel';
import { NameInputDialog } from './components/NameInputDialog';
import { SettingsPanel } from './components/SettingsPanel';
import { StatusPanel } from './components/StatusPanel';
import { useMinesweeperStore } from './useMinesweeperStore';

const LazyMinesweeperPhaserCanvas = lazy(() =>
  import('./MinesweeperPhaserCanvas').then((m) => ({ default: m.MinesweeperPhaserCanvas }))
);

export function MinesweeperPage() {
  const {
    status,
    seconds,
    minesLeft,
    difficulty,
    rows,
    cols,
    mines,
    mode,
    lastResult,
    awaitingName,
    leaderboardRows,
    fatalError,
    restart,
    tick,
    setDifficulty,
    setRows,
    setCols,
    setMines,
    showLeaderboard,
    hideLeaderboard,
    openNameInput,
    submitName
  } = useMinesweeperStore();

  useEffect(() => {
    if (status !== 'playing') return;
    const id = window.setInterval(tick, 1000);
    return () => window.clearInterval(id);
  }, [status, tick]);

  useEffect(() => {
    if (!awaitingName) return;
    const id = window.setTimeout(openNameInput, DELAY_BEFORE_NAME_INPUT_MS);
    return () => window.clearTimeout(id);
  }, [awaitingName, openNameInput]);

  useEffect(() => {
    const onKeyDown = (event: KeyboardEvent) => {
      const shortcut = keyToShortcut(event);
      if (shortcut === 'leave-leaderboard') hideLeaderboard();
      if (shortcut === 'restart' && useMinesweeperStore.getState().mode === 'game') restart();
    };
    window.addEventListener('keydown', onKeyDown);
    return () => window.removeEventListener('keydown', onKeyDown);
  }, [hideLeaderboard, restart]);

  if (fatalError) {
    return (
      <div className="min-h-screen grid place-items-center bg-sweeper-blue p-6">
        <div className="max-w-md border-[6px] border-[#121212] bg-[#f2ead7] p-6 shadow-[8px_8px_0_#121212]">
          <div className="flex items-center gap-3 text-2xl font-black text-[#8d1f2f]">
            <AlertTriangle />
            CANNOT START
          </div>
          <p className="mt-4 text-sm text-[#2d2d2d] break-words">{fatalError}</p>
        </div>
      </div>
    );
  }

  return (
    <div
      className="min-h-screen text-[#121212]"
      style={{
        backgroundColor: '#0062ad',
        backgroundImage: 'radial-gradient(rgba(255,255,255,0.2) 0.8px, transparent 0.8px)',
        backgroundSize: '12px 12px',
        fontFamily: '"Space Grotesk","Avenir Next",sans-serif'
      }}
    >
      <main className="max-w-6xl mx-auto px-6 py-6 flex flex-col gap-4 md:flex-row md:items-start">
        <div className="border-[6px] border-sweeper-ink bg-sweeper-paper p-4 shadow-block overflow-auto">
          <Suspense fallback={<div className="p-8 text-sm tracking-[0.08em]">LOADING BOARD...</div>}>
            <LazyMinesweeperPhaserCanvas />
          </Suspense>
        </div>
        <aside className="flex w-full flex-col gap-4 md:w-72">
          <div className="text-xs uppercase tracking-[0.3em] text-[#dce8f7]">Minesweeper</div>
          <StatusPanel
            seconds={seconds}
            minesLeft={minesLeft}
            status={status}
            onRestart={restart}
            onLeaderboard={showLeaderboard}
          />
          <SettingsPanel
            difficulty={difficulty}
            rows={rows}
            cols={cols}
            mines={mines}
            onDifficulty={setDifficulty}
            onRows={setRows}
            onCols={setCols}
            onMines={setMines}
          />
        </aside>
      </main>

      {mode === 'leaderboard' && <LeaderboardPanel rows={leaderboardRows} onClose={hideLeaderboard} />}
      {mode === 'name_input' && lastResult && <NameInputDialog time={lastResult.time} onSubmit={submitName} />}
    </div>
  );
}
