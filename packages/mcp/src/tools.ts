/**
 * @module tools
 * MCP tool definitions and handlers for the trip planner.
 *
 * Each mutating tool builds one command through the session's factory and
 * runs it on the session's invoker, so every change lands in the undo history.
 * Arguments are checked with zod; business rules stay in the commands.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CommandKind, CommandPayloadMap } from '@trip-planner/types';
import type { TripSession } from '@trip-planner/core';
import { ITEM_KINDS, ValidationFailure, errorMessage } from '@trip-planner/core';
import { z } from 'zod';

const idProperty = (description: string) => ({ type: 'integer', minimum: 1, description });
const textProperty = (description: string) => ({ type: 'string', description });

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  // ── Trips ──────────────────────────────────────────────────────
  {
    name: 'create_trip',
    description:
      'Create a trip owned by a user. A free six-character share code is generated ' +
      'when shareCode is omitted.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        userId: idProperty('Owner user id'),
        destination: textProperty('Destination, e.g. "Lisbon"'),
        name: textProperty('Trip name'),
        startDate: textProperty('ISO start date (YYYY-MM-DD)'),
        endDate: textProperty('ISO end date, not before startDate'),
        shareCode: textProperty('Requested share code (optional)'),
      },
      required: ['userId', 'destination', 'name', 'startDate', 'endDate'],
    },
  },
  {
    name: 'update_budget',
    description: 'Set the budget of a trip. Must be a finite number >= 0.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        budget: { type: 'number', minimum: 0, description: 'New budget' },
      },
      required: ['tripId', 'budget'],
    },
  },
  {
    name: 'add_collaborator',
    description: 'Give a user access to a trip. Fails for the owner or an existing collaborator.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        userId: idProperty('User to add'),
      },
      required: ['tripId', 'userId'],
    },
  },
  {
    name: 'get_trip',
    description: 'Get a trip with its flights, hotels, activities and expenses.',
    inputSchema: {
      type: 'object' as const,
      properties: { tripId: idProperty('Trip id') },
      required: ['tripId'],
    },
  },

  // ── Itinerary ──────────────────────────────────────────────────
  {
    name: 'add_flight',
    description: 'Add a flight to a trip.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        company: textProperty('Airline'),
        code: textProperty('Flight code'),
        departure: textProperty('ISO departure date-time'),
        arrival: textProperty('ISO arrival date-time'),
      },
      required: ['tripId', 'company', 'code', 'departure', 'arrival'],
    },
  },
  {
    name: 'add_hotel',
    description: 'Add a hotel stay to a trip. checkin may not be after checkout.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        name: textProperty('Hotel name'),
        checkin: textProperty('ISO check-in date'),
        checkout: textProperty('ISO check-out date'),
      },
      required: ['tripId', 'name', 'checkin', 'checkout'],
    },
  },
  {
    name: 'add_activity',
    description: 'Add an activity to a trip.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        description: textProperty('What to do'),
        date: textProperty('ISO date'),
      },
      required: ['tripId', 'description', 'date'],
    },
  },
  {
    name: 'add_expense',
    description: 'Record an expense against a trip.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        tripId: idProperty('Trip id'),
        description: textProperty('What was paid for'),
        amount: { type: 'number', minimum: 0, description: 'Amount paid' },
        currency: textProperty('ISO 4217 currency code'),
        date: textProperty('ISO date'),
        category: textProperty('Category, e.g. "food"'),
      },
      required: ['tripId', 'description', 'amount', 'currency', 'date', 'category'],
    },
  },
  {
    name: 'set_item_status',
    description: 'Mark an itinerary item as done or not done.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        itemKind: { type: 'string', enum: [...ITEM_KINDS], description: 'Item kind' },
        itemId: idProperty('Item id'),
        isDone: { type: 'boolean', description: 'New status' },
      },
      required: ['itemKind', 'itemId', 'isDone'],
    },
  },

  // ── History ────────────────────────────────────────────────────
  {
    name: 'undo',
    description: 'Undo the most recent applied change.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'redo',
    description: 'Redo the most recently undone change.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'get_history',
    description: 'List recorded changes, oldest first. start/end select a half-open range, clamped to the history.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        start: { type: 'integer', description: 'First index (inclusive)' },
        end: { type: 'integer', description: 'Last index (exclusive)' },
      },
    },
  },
  {
    name: 'get_statistics',
    description: 'Counts of recorded changes by status and kind, plus undo/redo availability.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
];

// ── Argument schemas ───────────────────────────────────────────

const id = z.number().int().positive();

const CreateTripArgs = z.object({
  userId: id,
  destination: z.string(),
  name: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  shareCode: z.string().optional(),
});
const UpdateBudgetArgs = z.object({ tripId: id, budget: z.number() });
const AddCollaboratorArgs = z.object({ tripId: id, userId: id });
const TripArgs = z.object({ tripId: id });
const AddFlightArgs = z.object({
  tripId: id,
  company: z.string(),
  code: z.string(),
  departure: z.string(),
  arrival: z.string(),
});
const AddHotelArgs = z.object({ tripId: id, name: z.string(), checkin: z.string(), checkout: z.string() });
const AddActivityArgs = z.object({ tripId: id, description: z.string(), date: z.string() });
const AddExpenseArgs = z.object({
  tripId: id,
  description: z.string(),
  amount: z.number(),
  currency: z.string(),
  date: z.string(),
  category: z.string(),
});
const SetItemStatusArgs = z.object({
  itemKind: z.enum(ITEM_KINDS),
  itemId: id,
  isDone: z.boolean(),
});
const HistoryArgs = z.object({ start: z.number().int().optional(), end: z.number().int().optional() });

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, args: Record<string, unknown>): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationFailure(`Invalid arguments for ${tool}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Handle a tool call against one session.
 * Returns an MCP CallToolResult with text content.
 */
export function handleToolCall(
  session: TripSession,
  toolName: string,
  args: Record<string, unknown>,
): ToolResult {
  try {
    switch (toolName) {
      case 'create_trip':
        return runCommand(session, 'CreateTrip', parseArgs(toolName, CreateTripArgs, args));
      case 'update_budget':
        return runCommand(session, 'UpdateBudget', parseArgs(toolName, UpdateBudgetArgs, args));
      case 'add_collaborator':
        return runCommand(session, 'AddCollaborator', parseArgs(toolName, AddCollaboratorArgs, args));
      case 'add_flight':
        return runCommand(session, 'AddFlight', parseArgs(toolName, AddFlightArgs, args));
      case 'add_hotel':
        return runCommand(session, 'AddHotel', parseArgs(toolName, AddHotelArgs, args));
      case 'add_activity':
        return runCommand(session, 'AddActivity', parseArgs(toolName, AddActivityArgs, args));
      case 'add_expense':
        return runCommand(session, 'AddExpense', parseArgs(toolName, AddExpenseArgs, args));
      case 'set_item_status':
        return runCommand(session, 'UpdateItemStatus', parseArgs(toolName, SetItemStatusArgs, args));

      case 'undo': {
        const { invoker } = session;
        if (!invoker.undo()) return errorResult(invoker.lastError?.message ?? 'Undo failed');
        const [undone] = invoker.history({ start: invoker.cursor + 1, end: invoker.cursor + 2 });
        return formatResult({ undone, cursor: invoker.cursor });
      }

      case 'redo': {
        const { invoker } = session;
        if (!invoker.redo()) return errorResult(invoker.lastError?.message ?? 'Redo failed');
        const [redone] = invoker.history({ start: invoker.cursor, end: invoker.cursor + 1 });
        return formatResult({ redone, cursor: invoker.cursor });
      }

      case 'get_history': {
        const range = parseArgs(toolName, HistoryArgs, args);
        const { invoker } = session;
        return formatResult({ cursor: invoker.cursor, size: invoker.size, entries: invoker.history(range) });
      }

      case 'get_statistics':
        return formatResult(session.invoker.statistics());

      case 'get_trip': {
        const { tripId } = parseArgs(toolName, TripArgs, args);
        const { store } = session;
        const trip = store.findById('trips', tripId);
        if (!trip) return errorResult(`Trip ${tripId} not found`);
        const ofTrip = (item: { tripId: number }) => item.tripId === tripId;
        return formatResult({
          trip,
          flights: store.list('flights', ofTrip),
          hotels: store.list('hotels', ofTrip),
          activities: store.list('activities', ofTrip),
          expenses: store.list('expenses', ofTrip),
        });
      }

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    session.logger.warn({ tool: toolName, err: e }, 'tool call failed');
    return errorResult(errorMessage(e));
  }
}

function runCommand<K extends CommandKind>(
  session: TripSession,
  kind: K,
  payload: CommandPayloadMap[K],
): ToolResult {
  const command = session.commands.create(kind, payload);
  const outcome = session.invoker.execute(command);
  if (!outcome.ok) return errorResult(outcome.error.message);
  return formatResult({ command: command.describe(), result: outcome.value });
}

// ── Response formatters ────────────────────────────────────────

type ContentItem = { type: 'text'; text: string };
export type ToolResult = { content: ContentItem[]; isError?: boolean };

function formatResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
