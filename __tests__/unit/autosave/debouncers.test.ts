import { KeyedDebouncer } from '@/lib/autosave/keyed-debouncer'
import { MovementDebouncer } from '@/lib/autosave/movement-debouncer'
import { FocusTracker } from '@/lib/autosave/focus-tracker'
import type { AutoSaveEvent } from '@/lib/autosave/events'

const positionAt = (x: number) => ({ x, y: 1, z: -1, width: 400, height: 300 })

describe('KeyedDebouncer', () => {
  beforeEach(() => {
    jest.useFakeTimers()
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  it('fires once per key with the latest value', () => {
    const fired: Array<[string, number]> = []
    const debouncer = new KeyedDebouncer<string, number>(100, (key, value) => fired.push([key, value]))

    debouncer.schedule('a', 1)
    jest.advanceTimersByTime(60)
    debouncer.schedule('a', 2)
    debouncer.schedule('b', 3)
    jest.advanceTimersByTime(60)
    expect(fired).toEqual([])

    jest.advanceTimersByTime(40)
    expect(fired).toEqual([
      ['a', 2],
      ['b', 3],
    ])
    expect(debouncer.size).toBe(0)
  })

  it('never fires a cancelled key', () => {
    const onFire = jest.fn()
    const debouncer = new KeyedDebouncer<string, null>(100, onFire)

    debouncer.schedule('a', null)
    expect(debouncer.cancel('a')).toBe(true)
    jest.advanceTimersByTime(500)

    expect(onFire).not.toHaveBeenCalled()
    expect(debouncer.cancel('a')).toBe(false)
  })

  it('flushes a pending key immediately', () => {
    const onFire = jest.fn()
    const debouncer = new KeyedDebouncer<string, number>(100, onFire)

    debouncer.schedule('a', 5)
    expect(debouncer.flush('a')).toBe(true)
    jest.advanceTimersByTime(500)

    expect(onFire).toHaveBeenCalledTimes(1)
    expect(onFire).toHaveBeenCalledWith('a', 5)
  })
})

describe('MovementDebouncer', () => {
  beforeEach(() => {
    jest.useFakeTimers()
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  it('collapses a burst of 50 samples into one event carrying the last position', () => {
    const events: AutoSaveEvent[] = []
    const debouncer = new MovementDebouncer((event) => events.push(event), 1000)

    for (let i = 0; i < 50; i++) {
      debouncer.recordMovement(7, positionAt(i))
      jest.advanceTimersByTime(19)
    }
    // Last sample was recorded 19ms ago
    jest.advanceTimersByTime(980)
    expect(events).toEqual([])

    jest.advanceTimersByTime(1)
    expect(events).toEqual([{ type: 'movement-stopped', windowId: 7, position: positionAt(49) }])

    jest.advanceTimersByTime(5000)
    expect(events).toHaveLength(1)
  })

  it('debounces each window independently', () => {
    const events: AutoSaveEvent[] = []
    const debouncer = new MovementDebouncer((event) => events.push(event), 1000)

    debouncer.recordMovement(1, positionAt(1))
    jest.advanceTimersByTime(500)
    debouncer.recordMovement(2, positionAt(2))
    jest.advanceTimersByTime(500)

    expect(events).toEqual([{ type: 'movement-stopped', windowId: 1, position: positionAt(1) }])
    expect(debouncer.isPending(2)).toBe(true)
  })

  it('drops pending movement for a cancelled window', () => {
    const emit = jest.fn()
    const debouncer = new MovementDebouncer(emit, 1000)

    debouncer.recordMovement(3, positionAt(3))
    debouncer.cancel(3)
    jest.advanceTimersByTime(2000)

    expect(emit).not.toHaveBeenCalled()
  })

  it('copies the recorded position', () => {
    const events: AutoSaveEvent[] = []
    const debouncer = new MovementDebouncer((event) => events.push(event), 1000)
    const position = positionAt(1)

    debouncer.recordMovement(4, position)
    position.x = 99
    debouncer.flushAll()

    expect(events).toEqual([{ type: 'movement-stopped', windowId: 4, position: positionAt(1) }])
  })
})

describe('FocusTracker', () => {
  beforeEach(() => {
    jest.useFakeTimers()
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  it('forwards focus gain at once and debounces focus loss', () => {
    const events: AutoSaveEvent[] = []
    const tracker = new FocusTracker((event) => events.push(event), 500)

    tracker.focusGained(1)
    expect(events).toEqual([{ type: 'focus-gained', windowId: 1 }])
    expect(tracker.getFocusedWindowId()).toBe(1)

    tracker.focusLost(1)
    expect(tracker.getFocusedWindowId()).toBeNull()
    jest.advanceTimersByTime(499)
    expect(events).toHaveLength(1)

    jest.advanceTimersByTime(1)
    expect(events[1]).toEqual({ type: 'focus-lost', windowId: 1 })
  })

  it('cancels a pending loss when the window is refocused', () => {
    const events: AutoSaveEvent[] = []
    const tracker = new FocusTracker((event) => events.push(event), 500)

    tracker.focusLost(2)
    jest.advanceTimersByTime(200)
    tracker.focusGained(2)
    jest.advanceTimersByTime(1000)

    expect(events).toEqual([{ type: 'focus-gained', windowId: 2 }])
  })
})
