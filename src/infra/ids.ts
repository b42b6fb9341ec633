import { v4 as uuid } from 'uuid';

export interface IdGenerator {
  ticketId(): string;
  passId(): string;
}

export const uuidIds: IdGenerator = {
  ticketId: () => uuid(),
  passId: () => uuid()
};
