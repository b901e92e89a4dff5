export type ScrapeStatus = 'found' | 'finished' | 'failed';

export type ScrapePhase = 'discovery' | 'detail' | 'both';

/** Linha da listagem de editais (datas como aparecem no portal, em ROC) */
export interface TenderListing {
    orgName: string;
    tenderNo: string;
    projectName: string;
    detailUrl: string;
    pkPmsMain: string;
    publicationDate: string;
    deadline: string;
    publicationDateGregorian: Date | null;
    deadlineGregorian: Date | null;
}

/** Campos da página de detalhe, já com o nome da coluna do banco */
export type TenderDetails = Record<string, string>;

export interface Organization {
    siteId: string;
    name: string;
}

/** Registro gravado em `tenders` (colunas do banco) */
export interface TenderRecord {
    organization_id: string;
    tender_no: string;
    publication_date: string;
    scrap_status: ScrapeStatus;
    url?: string;
    pk_pms_main?: string;
    project_name?: string;
    deadline?: string | null;
    org_name?: string;
    [column: string]: string | null | undefined;
}

export interface PendingTender {
    tender_no: string;
    organization_id: string;
    url: string;
    pk_pms_main: string;
    publication_date: string;
}

export interface StoredTender {
    tender_no: string;
    organization_id: string;
    org_name: string | null;
    project_name: string | null;
    url: string | null;
    publication_date: string;
    deadline: string | null;
    scrap_status: ScrapeStatus | null;
    tender_method: string | null;
    budget_amount: string | null;
}

export interface ScrapeRunOptions {
    query: string;
    timeRange: string;
    pageSize: number;
    phase: ScrapePhase;
    keepDebugImages: boolean;
}

export interface ScrapeRunSummary {
    discovered: number;
    detailed: number;
    detailSucceeded: number;
    startedAt: Date;
    finishedAt: Date;
}
