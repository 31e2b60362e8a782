import { generateSlots, type SlotGenerationInput } from './slot-generator';

const iso = (slots: { start: Date; end: Date }[]) =>
  slots.map((slot) => [slot.start.toISOString(), slot.end.toISOString()]);

describe('generateSlots', () => {
  const base: SlotGenerationInput = {
    date: '2026-01-05',
    timezone: 'UTC',
    now: new Date('2026-01-05T08:00:00Z'),
    windows: [{ startTime: '09:00', endTime: '10:00' }],
    booked: [],
  };

  it('splits a window into 30-minute slots', () => {
    expect(iso(generateSlots(base))).toEqual([
      ['2026-01-05T09:00:00.000Z', '2026-01-05T09:30:00.000Z'],
      ['2026-01-05T09:30:00.000Z', '2026-01-05T10:00:00.000Z'],
    ]);
  });

  it('leaves out booked starts', () => {
    const slots = generateSlots({
      ...base,
      booked: [new Date('2026-01-05T09:00:00Z')],
    });

    expect(iso(slots)).toEqual([
      ['2026-01-05T09:30:00.000Z', '2026-01-05T10:00:00.000Z'],
    ]);
  });

  it('only offers slots that start strictly after now', () => {
    const slots = generateSlots({
      ...base,
      now: new Date('2026-01-05T09:00:00Z'),
    });

    expect(iso(slots)).toEqual([
      ['2026-01-05T09:30:00.000Z', '2026-01-05T10:00:00.000Z'],
    ]);
  });

  it('emits floor(L / 30) slots and drops a short tail', () => {
    const slots = generateSlots({
      ...base,
      windows: [{ startTime: '09:00', endTime: '10:45' }],
    });

    expect(slots).toHaveLength(3);
    expect(slots[2].end.toISOString()).toBe('2026-01-05T10:30:00.000Z');
  });

  it('yields nothing for a window shorter than a slot', () => {
    const slots = generateSlots({
      ...base,
      windows: [{ startTime: '09:00', endTime: '09:20' }],
    });

    expect(slots).toEqual([]);
  });

  it('orders by window start and keeps each window aligned to its origin', () => {
    const slots = generateSlots({
      ...base,
      windows: [
        { startTime: '14:15:00', endTime: '15:15:00' },
        { startTime: '09:00:00', endTime: '09:30:00' },
      ],
    });

    expect(slots.map((slot) => slot.start.toISOString())).toEqual([
      '2026-01-05T09:00:00.000Z',
      '2026-01-05T14:15:00.000Z',
      '2026-01-05T14:45:00.000Z',
    ]);
  });

  it('interprets window times in the requested timezone', () => {
    const slots = generateSlots({
      ...base,
      timezone: 'Asia/Kolkata',
      now: new Date('2026-01-04T00:00:00Z'),
    });

    expect(slots.map((slot) => slot.start.toISOString())).toEqual([
      '2026-01-05T03:30:00.000Z',
      '2026-01-05T04:00:00.000Z',
    ]);
  });

  it('never emits overlapping slots for any window length', () => {
    for (let length = 0; length <= 240; length += 10) {
      const end = 9 * 60 + length;
      const endTime = `${String(Math.floor(end / 60)).padStart(2, '0')}:${String(end % 60).padStart(2, '0')}`;
      const slots = generateSlots({
        ...base,
        windows: [{ startTime: '09:00', endTime }],
      });

      expect(slots).toHaveLength(Math.floor(length / 30));
      for (let i = 1; i < slots.length; i++) {
        expect(slots[i].start.getTime()).toBe(slots[i - 1].end.getTime());
      }
    }
  });
});
