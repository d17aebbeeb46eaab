import { ChevronLeft, ChevronRight } from 'lucide-react';
import { config } from '../../lib/config';
import { PREVIEW_IMAGES } from '../../data/insights';
import { useRotation } from '../../hooks/useRotation';
import { Button } from '../ui/button';

interface PreviewCarouselProps {
  images?: readonly string[];
  intervalMs?: number;
}

export function PreviewCarousel({
  images = PREVIEW_IMAGES,
  intervalMs = config.previewRotationMs,
}: PreviewCarouselProps) {
  const { index, next, prev } = useRotation(images.length, { intervalMs });

  if (!images.length) return null;

  return (
    <div className="space-y-3">
      <img
        src={`${import.meta.env.BASE_URL}${images[index]}`}
        alt={`Wind turbine preview ${index + 1} of ${images.length}`}
        className="w-full h-48 object-cover rounded-lg border border-slate-700"
      />
      <div className="flex items-center justify-between">
        <Button variant="secondary" size="sm" onClick={prev} aria-label="Previous image">
          <ChevronLeft className="h-4 w-4" />
        </Button>
        <span className="text-xs text-slate-400 tabular-nums">
          {index + 1} / {images.length}
        </span>
        <Button variant="secondary" size="sm" onClick={next} aria-label="Next image">
          <ChevronRight className="h-4 w-4" />
        </Button>
      </div>
    </div>
  );
}
