import React, { useState } from 'react';
import { Send } from 'lucide-react';
import {
  SUGGESTIONS,
  resolveChipSelection,
  resolveQuerySubmission,
} from '../../lib/queryMatcher';
import { config } from '../../lib/config';
import { redirectTo } from '../../lib/navigation';
import { Button } from '../ui/button';
import { Card } from '../ui/card';
import { Input } from '../ui/input';

interface QueryPanelProps {
  /** Called with the target URL when a question resolves to a redirect */
  onNavigate?: (url: string) => void;
}

export function QueryPanel({ onNavigate = redirectTo }: QueryPanelProps) {
  const [question, setQuestion] = useState('');
  const [clickCounts, setClickCounts] = useState<number[]>(() => SUGGESTIONS.map(() => 0));

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    const target = resolveQuerySubmission(question);
    if (target) {
      onNavigate(target);
    } else {
      console.log('[query] No supported match for:', question);
    }
  };

  const handleChip = (index: number) => {
    const counts = clickCounts.map((count, i) => (i === index ? count + 1 : count));
    setClickCounts(counts);
    setQuestion(SUGGESTIONS[index].query);

    if (resolveChipSelection(index, counts) === 'redirect') {
      onNavigate(config.redirectUrl);
    }
  };

  return (
    <Card className="p-6 space-y-4">
      <h3 className="text-lg font-semibold text-white">Ask the model about your turbines</h3>

      <form onSubmit={handleSubmit} className="flex gap-3">
        <Input
          value={question}
          onChange={(e) => setQuestion(e.target.value)}
          placeholder='e.g., "Predict the main beraing failures in the next 2 months?"'
          aria-label="Question"
        />
        <Button type="submit" disabled={!question.trim()} className="px-6 h-[50px]">
          <Send className="h-4 w-4 mr-2" />
          Ask
        </Button>
      </form>

      <div className="flex flex-wrap gap-2">
        {SUGGESTIONS.map((suggestion, index) => (
          <button
            key={suggestion.label}
            type="button"
            onClick={() => handleChip(index)}
            className="rounded-full border border-slate-600 bg-slate-700/60 px-3 py-1 text-xs text-slate-200 hover:bg-slate-600"
          >
            {suggestion.label}
          </button>
        ))}
      </div>
    </Card>
  );
}
