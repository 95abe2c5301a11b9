/**
 * Chinese patent categories as printed on the certificate.
 */
export type PatentType = '发明' | '实用新型' | '外观设计';

export interface PatentFields {
    /** `ZL` + year + type digit + serial + `.` + check char */
    patentNumber?: string;
    /** 授权公告号, e.g. CN116055099B */
    grantNumber?: string;
    title?: string;
    /** `;`-joined */
    inventors?: string;
    patentee?: string;
    applicationDate?: string;
    grantDate?: string;
    patentType: PatentType;
}

export interface SoftwareFields {
    softwareName?: string;
    version?: string;
    /** e.g. 2023SR0123456 */
    registrationNumber?: string;
    copyrightHolder?: string;
    developmentDate?: string;
}

export type CertificateKind = 'patent' | 'software' | 'neither';

/**
 * Provenance of the text a certificate was read from.
 */
export type ExtractionMethod = 'ocr' | 'pdf_text' | 'text_file' | 'pdf+ocr';

interface CertificateBase {
    method: ExtractionMethod;
    rawText: string;
}

export interface PatentCertificate extends CertificateBase {
    kind: 'patent';
    fields: PatentFields;
    complete: boolean;
}

export interface SoftwareCertificate extends CertificateBase {
    kind: 'software';
    fields: SoftwareFields;
    complete: boolean;
}

export interface UnclassifiedCertificate extends CertificateBase {
    kind: 'neither';
}

export type CertificateResult = PatentCertificate | SoftwareCertificate | UnclassifiedCertificate;

export interface PatentNumberValidation {
    valid: boolean;
    reason: string;
}
