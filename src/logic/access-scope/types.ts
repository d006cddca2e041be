export enum Role {
    Finance = 'Finance',
    Marketing = 'Marketing',
    HR = 'HR',
    Engineering = 'Engineering',
    Employee = 'Employee',
    CLevel = 'C-Level',
}

export enum CollectionId {
    Finance = 'Finance',
    Marketing = 'Marketing',
    HR = 'HR',
    Engineering = 'Engineering',
    General = 'General',
}

export interface AccessScope {
    readonly role: Role;
    readonly collections: readonly CollectionId[];
}

/** The only place roles map to collections. */
export const ROLE_COLLECTIONS: Readonly<Record<Role, readonly CollectionId[]>> = {
    [Role.Finance]: [CollectionId.Finance, CollectionId.General],
    [Role.Marketing]: [CollectionId.Marketing, CollectionId.General],
    [Role.HR]: [CollectionId.HR, CollectionId.General],
    [Role.Engineering]: [CollectionId.Engineering, CollectionId.General],
    [Role.Employee]: [CollectionId.General],
    [Role.CLevel]: [
        CollectionId.Finance,
        CollectionId.Marketing,
        CollectionId.HR,
        CollectionId.Engineering,
        CollectionId.General,
    ],
};

export const ROLE_DESCRIPTIONS: Readonly<Record<Role, string>> = {
    [Role.Finance]: 'Financial reports, expenses and budgets',
    [Role.Marketing]: 'Campaign data, customer feedback and sales metrics',
    [Role.HR]: 'Employee data, attendance, payroll and performance',
    [Role.Engineering]: 'Technical architecture and development processes',
    [Role.Employee]: 'General company policies, events and FAQs',
    [Role.CLevel]: 'Full access to all company data',
};
