import { type RefObject, useEffect, useState } from "react";

export interface ElementSize {
  height: number;
  width: number;
}

/**
 * Tracks the content box of an element. Both dimensions stay 0 until the
 * first observation, and charts skip drawing until then.
 */
export function useElementSize(ref: RefObject<HTMLElement | null>): ElementSize {
  const [dimensions, setDimensions] = useState<ElementSize>({
    height: 0,
    width: 0,
  });

  useEffect(() => {
    const container = ref.current;
    if (!container) return;

    const resizeObserver = new ResizeObserver((entries) => {
      if (entries.length === 0) return;
      const { height, width } = entries[0].contentRect;
      setDimensions({ height, width });
    });

    resizeObserver.observe(container);

    return () => {
      resizeObserver.disconnect();
    };
  }, [ref]);

  return dimensions;
}
