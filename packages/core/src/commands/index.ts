/**
 * @module commands
 * Undoable trip mutations, one class per command kind.
 */

export { StoreCommand } from './store-command';
export type { Applied } from './store-command';
export { CreateTripCommand } from './create-trip';
export { UpdateBudgetCommand } from './update-budget';
export type { BudgetInverse } from './update-budget';
export { AddCollaboratorCommand } from './add-collaborator';
export type { CollaboratorInverse } from './add-collaborator';
export { AddFlightCommand } from './add-flight';
export { AddHotelCommand } from './add-hotel';
export { AddActivityCommand } from './add-activity';
export { AddExpenseCommand } from './add-expense';
export { UpdateItemStatusCommand } from './update-item-status';
export type { ItemStatusInverse } from './update-item-status';
