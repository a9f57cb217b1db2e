import type { ImportTemplate } from '@tableimport/core';
import type { ImportTemplateRow } from '../models/ImportTemplateModel.js';
import { toNumber } from '../utils/toNumber.js';

export function toDomain(row: ImportTemplateRow): ImportTemplate {
  const base: ImportTemplate = {
    id: row.AIT_ImportTemplate_ID,
    tabId: row.AD_Tab_ID,
    headerCsv: row.AIT_HeaderCSV,
    clientId: toNumber(row.AD_Client_ID) ?? 0,
    orgId: toNumber(row.AD_Org_ID) ?? 0,
  };
  return row.Name === null ? base : { ...base, name: row.Name };
}

export function toRow(template: ImportTemplate): ImportTemplateRow {
  return {
    AIT_ImportTemplate_ID: template.id,
    Name: template.name ?? null,
    AD_Tab_ID: template.tabId,
    AIT_HeaderCSV: template.headerCsv,
    AD_Client_ID: template.clientId,
    AD_Org_ID: template.orgId,
    IsActive: 'Y',
  };
}
