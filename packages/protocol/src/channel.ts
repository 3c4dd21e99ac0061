export type ChannelType = "group" | "dm";

export interface Channel {
  id: string;
  name: string; // canonical: "group" or "dm:<a>-<b>" with a < b
  type: ChannelType;
  participants: string[];
  description?: string;
  lastActivityAt: number | null;
  createdAt: number;
}
