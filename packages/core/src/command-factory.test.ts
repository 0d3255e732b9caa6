import { describe, it, expect } from 'vitest';
import { storeWith, tripFixture } from './__tests__/fixtures';
import { CommandFactory } from './command-factory';
import { AddHotelCommand, UpdateItemStatusCommand } from './commands';

describe('CommandFactory', () => {
  it('builds a pending command of the requested kind', () => {
    const factory = new CommandFactory(storeWith(tripFixture()));
    const cmd = factory.create('AddHotel', {
      tripId: 7,
      name: 'Casa Azul',
      checkin: '2026-04-01',
      checkout: '2026-04-05',
    });

    expect(cmd).toBeInstanceOf(AddHotelCommand);
    expect(cmd.kind).toBe('AddHotel');
    expect(cmd.status).toBe('pending');
  });

  it('binds commands to its store', () => {
    const store = storeWith(tripFixture());
    const factory = new CommandFactory(store);

    const result = factory.create('UpdateBudget', { tripId: 7, budget: 300 }).execute();

    expect(result.ok).toBe(true);
    expect(store.findById('trips', 7)?.budget).toBe(300);
    expect(factory.create('UpdateItemStatus', { itemKind: 'flight', itemId: 1, isDone: true })).toBeInstanceOf(
      UpdateItemStatusCommand,
    );
  });
});
