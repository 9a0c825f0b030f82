import { useState, useEffect, useCallback } from 'react'
import { useInput } from 'ink'

interface UseListNavigationOptions {
  /** Total number of items in the list */
  itemCount: number
  /** Number of visible items in the viewport */
  viewportSize?: number
  /** Called with the selected index on enter */
  onOpen?: (index: number) => void
  /** Whether navigation is enabled */
  enabled?: boolean
}

interface UseListNavigationResult {
  selectedIndex: number
  /** Items to render (slice indices) */
  visibleRange: { start: number; end: number }
  /** Position display string like "12/45" */
  positionDisplay: string
  isSelected: (index: number) => boolean
}

/**
 * List navigation with a scrolling viewport: j/k or arrows move, gg and G
 * jump to the ends, PgUp/PgDn move a page, enter opens the selected item.
 *
 * @example
 * const { visibleRange, isSelected } = useListNavigation({
 *   itemCount: rows.length,
 *   viewportSize: 15,
 *   onOpen: (i) => navigate('detail', { category: rows[i].name }),
 * })
 */
export const useListNavigation = ({
  itemCount,
  viewportSize = 20,
  onOpen,
  enabled = true,
}: UseListNavigationOptions): UseListNavigationResult => {
  const [selectedIndex, setSelectedIndexState] = useState(0)
  const [viewportStart, setViewportStart] = useState(0)
  const [waitingForG, setWaitingForG] = useState(false)

  const effectiveViewportSize = Math.min(viewportSize, itemCount)

  // Keep selection in bounds when item count changes (filtering)
  useEffect(() => {
    if (selectedIndex >= itemCount) {
      setSelectedIndexState(Math.max(0, itemCount - 1))
    }
  }, [itemCount, selectedIndex])

  // Keep viewport following selection
  useEffect(() => {
    if (selectedIndex < viewportStart) {
      setViewportStart(selectedIndex)
    } else if (selectedIndex >= viewportStart + effectiveViewportSize) {
      setViewportStart(Math.max(0, selectedIndex - effectiveViewportSize + 1))
    }
  }, [selectedIndex, viewportStart, effectiveViewportSize])

  const moveBy = useCallback(
    (delta: number) => {
      setSelectedIndexState((prev) => Math.max(0, Math.min(prev + delta, itemCount - 1)))
    },
    [itemCount]
  )

  useInput(
    (input, key) => {
      if (waitingForG) {
        setWaitingForG(false)
        if (input === 'g') {
          setSelectedIndexState(0)
          return
        }
      }

      if (input === 'G') {
        setSelectedIndexState(Math.max(0, itemCount - 1))
      } else if (input === 'g') {
        setWaitingForG(true)
      } else if (input === 'j' || key.downArrow) {
        moveBy(1)
      } else if (input === 'k' || key.upArrow) {
        moveBy(-1)
      } else if (key.pageDown) {
        moveBy(effectiveViewportSize)
      } else if (key.pageUp) {
        moveBy(-effectiveViewportSize)
      } else if (key.return && onOpen && itemCount > 0) {
        onOpen(selectedIndex)
      }
    },
    { isActive: enabled }
  )

  const isSelected = useCallback((index: number) => index === selectedIndex, [selectedIndex])

  return {
    selectedIndex,
    visibleRange: {
      start: viewportStart,
      end: Math.min(viewportStart + effectiveViewportSize, itemCount),
    },
    positionDisplay: itemCount > 0 ? `${selectedIndex + 1}/${itemCount}` : '0/0',
    isSelected,
  }
}
