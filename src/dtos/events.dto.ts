export type SlotOccupied = {
  type: 'SlotOccupied';
  slotId: string;
  ticketId: string;
  ts: string;
};

export type SlotFreed = {
  type: 'SlotFreed';
  slotId: string;
  ticketId: string;
  fee: number;
  ts: string;
};

export type EngineEvent = SlotOccupied | SlotFreed;

export type EngineEventListener = (event: EngineEvent) => void;
