import { describe, it, expect } from 'vitest';
import { ReplySlot } from './reply-slot';

describe('ReplySlot', () => {
  it('delivers the first reply and refuses a second', async () => {
    const slot = new ReplySlot<string>();
    expect(slot.hasReply()).toBe(false);
    expect(slot.reply('Work')).toBe(true);
    expect(slot.reply('Other')).toBe(false);
    expect(slot.hasReply()).toBe(true);
    expect(await slot.wait()).toBe('Work');
  });
});
