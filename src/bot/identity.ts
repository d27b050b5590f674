export interface BotIdentity {
  name: string;
  version: string;
}

export const BOT_IDENTITY: BotIdentity = {
  name: "AlphaScope Bot",
  version: "3.1.1",
};

export function userAgentOf(identity: BotIdentity): string {
  return `${identity.name}/${identity.version}`;
}
