/**
 * Project Info — version number and design / check sign-off of a project.
 */

import { InvalidProjectError } from './errors';

export interface ProjectInfo {
    majorVersion: number;
    minorVersion: number;
    designer: string;
    /** YYYYMMDD, 0 when unset */
    designDate: number;
    /** Designer's registration number, 0 when unset */
    designRpeq: number;
    checker: string;
    checkDate: number;
    checkRpeq: number;
}

export type ProjectInfoField = keyof ProjectInfo;

export const DEFAULT_PROJECT_INFO: ProjectInfo = {
    majorVersion: 0,
    minorVersion: 1,
    designer: '',
    designDate: 0,
    designRpeq: 0,
    checker: '',
    checkDate: 0,
    checkRpeq: 0,
};

/** Display order */
export const PROJECT_INFO_FIELDS: readonly ProjectInfoField[] = [
    'majorVersion',
    'minorVersion',
    'designer',
    'designDate',
    'designRpeq',
    'checker',
    'checkDate',
    'checkRpeq',
];

export const MAX_PERSON_NAME_LENGTH = 32;

export const PROJECT_INFO_LABELS: Record<ProjectInfoField, string> = {
    majorVersion: 'Major version',
    minorVersion: 'Minor version',
    designer: 'Designer',
    designDate: 'Design date',
    designRpeq: 'Design RPEQ',
    checker: 'Checker',
    checkDate: 'Check date',
    checkRpeq: 'Check RPEQ',
};

const TEXT_FIELDS: ReadonlySet<ProjectInfoField> = new Set(['designer', 'checker']);

export function isTextField(field: ProjectInfoField): field is 'designer' | 'checker' {
    return TEXT_FIELDS.has(field);
}

function checkCount(field: ProjectInfoField, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidProjectError(`${PROJECT_INFO_LABELS[field]} must be a non-negative whole number`);
    }
    return value;
}

function checkPerson(field: ProjectInfoField, value: string): string {
    const trimmed = value.trim();
    if (trimmed.length > MAX_PERSON_NAME_LENGTH) {
        throw new InvalidProjectError(
            `${PROJECT_INFO_LABELS[field]} cannot exceed ${MAX_PERSON_NAME_LENGTH} characters`,
        );
    }
    return trimmed;
}

/** Validate every field of a patch; throws InvalidProjectError on the first bad one */
export function validateProjectInfo(patch: Partial<ProjectInfo>): Partial<ProjectInfo> {
    const result: Partial<ProjectInfo> = {};
    if (patch.majorVersion !== undefined) result.majorVersion = checkCount('majorVersion', patch.majorVersion);
    if (patch.minorVersion !== undefined) result.minorVersion = checkCount('minorVersion', patch.minorVersion);
    if (patch.designer !== undefined) result.designer = checkPerson('designer', patch.designer);
    if (patch.designDate !== undefined) result.designDate = checkCount('designDate', patch.designDate);
    if (patch.designRpeq !== undefined) result.designRpeq = checkCount('designRpeq', patch.designRpeq);
    if (patch.checker !== undefined) result.checker = checkPerson('checker', patch.checker);
    if (patch.checkDate !== undefined) result.checkDate = checkCount('checkDate', patch.checkDate);
    if (patch.checkRpeq !== undefined) result.checkRpeq = checkCount('checkRpeq', patch.checkRpeq);
    return result;
}

export function formatProjectVersion(info: ProjectInfo): string {
    return `v${info.majorVersion}.${info.minorVersion}`;
}
