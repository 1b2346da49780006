// src/models/endpoints.ts

export const API_PATH = {
  convertRteBody: 'api/convert_rte_body_format',
  del: 'api/del/',
  edit: 'api/editusertext/',
  info: 'api/info/',
  mediaAsset: 'api/media/asset.json',
  me: 'api/v1/me',
} as const;
