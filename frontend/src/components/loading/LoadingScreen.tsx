import { Wind } from 'lucide-react';
import { useFlowStore } from '../../stores/flowStore';
import { Card } from '../ui/card';

export function LoadingScreen() {
  const loaderStatus = useFlowStore((s) => s.loaderStatus);

  return (
    <div className="flex min-h-[60vh] items-center justify-center">
      <Card className="w-full max-w-md p-10 text-center space-y-6">
        <Wind className="mx-auto h-16 w-16 animate-spin text-sky-400 [animation-duration:3s]" />
        <h2 className="text-2xl font-semibold text-white">Generating Your Knowledge Graph</h2>
        <p role="status" className="text-sm text-slate-400">{loaderStatus}</p>
        <div className="animate-spin h-10 w-10 border-4 border-blue-500 border-t-transparent rounded-full mx-auto"></div>
      </Card>
    </div>
  );
}
