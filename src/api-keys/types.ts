export type ApiKeyRecord = {
  key: string;
  name: string;
  createdAt: string;
  expiresAt: string;
  active: boolean;
  usage: number;
};

export type ApiKeyStatus = 'active' | 'expired' | 'revoked';
