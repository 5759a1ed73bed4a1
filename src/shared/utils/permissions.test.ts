import { describe, it, expect } from 'vitest';
import { PermissionFlagsBits, PermissionsBitField } from 'discord.js';
import { checkBotOwnerOrAdmin } from './permissions.js';

describe('checkBotOwnerOrAdmin', () => {
  it('allows bot owners without permissions', () => {
    expect(checkBotOwnerOrAdmin('200', null)).toEqual({ allowed: true });
  });

  it('allows administrators', () => {
    const permissions = new PermissionsBitField(PermissionFlagsBits.Administrator);
    expect(checkBotOwnerOrAdmin('300', permissions)).toEqual({ allowed: true });
  });

  it('denies everyone else', () => {
    const permissions = new PermissionsBitField(PermissionFlagsBits.ManageMessages);

    expect(checkBotOwnerOrAdmin('300', permissions)).toEqual({
      allowed: false,
      reason: 'This command requires Administrator permissions or bot owner status.',
    });
    expect(checkBotOwnerOrAdmin('300', null).allowed).toBe(false);
  });
});
