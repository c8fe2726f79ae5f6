import { lazy, Suspense } from 'react';

const LazyMinesweeperPage = lazy(() =>
  import('./games/minesweeper/MinesweeperPage').then((m) => ({ default: m.MinesweeperPage }))
);

export default function App() {
  const loadingFallback = (
    <div className="min-h-screen grid place-items-center bg-[#0062ad] text-[#f4ecd8] text-sm tracking-[0.08em]">
      LOADING...
    </div>
  );

  return (
    <Suspense fallback={loadingFallback}>
      <LazyMinesweeperPage />
    </Suspense>
  );
}
