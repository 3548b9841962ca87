/**
 * School request catalog.
 *
 * Each request type is a zod schema for its payload plus a transform that
 * attaches the capability markers the type exposes. Handlers and the HTTP
 * adapter only ever see the parsed, marked value.
 */

import { z } from 'zod';
import { selfScoped, studentScoped, teacherScoped } from '../authz/capabilities.js';

const Id = z.coerce.number().int().positive();

export const CreateGradeSchema = z.object({
    sectionId: Id,
    subjectId: Id,
    studentId: Id,
    score: z.number().min(0).max(100),
    note: z.string().max(500).optional(),
}).strict().transform((payload) => ({
    requestType: 'CreateGrade' as const,
    ...payload,
    markers: [teacherScoped(payload.sectionId, payload.subjectId)],
}));

export const ListSectionGradesSchema = z.object({
    sectionId: Id,
    subjectId: Id,
}).strict().transform((payload) => ({
    requestType: 'ListSectionGrades' as const,
    ...payload,
    markers: [teacherScoped(payload.sectionId, payload.subjectId)],
}));

export const ListStudentGradesSchema = z.object({
    studentId: Id,
}).strict().transform((payload) => ({
    requestType: 'ListStudentGrades' as const,
    ...payload,
    markers: [studentScoped(payload.studentId)],
}));

export const GetStudentReportCardSchema = z.object({
    studentId: Id,
    term: z.string().min(1).max(32),
}).strict().transform((payload) => ({
    requestType: 'GetStudentReportCard' as const,
    ...payload,
    markers: [studentScoped(payload.studentId)],
}));

export const GetUserProfileSchema = z.object({
    userId: z.string().min(1),
}).strict().transform((payload) => ({
    requestType: 'GetUserProfile' as const,
    ...payload,
    markers: [selfScoped(payload.userId)],
}));

export const UpdateUserProfileSchema = z.object({
    userId: z.string().min(1),
    displayName: z.string().min(1).max(120),
}).strict().transform((payload) => ({
    requestType: 'UpdateUserProfile' as const,
    ...payload,
    markers: [selfScoped(payload.userId)],
}));

export const GetPaymentSchema = z.object({
    paymentId: Id,
}).strict().transform((payload) => ({
    requestType: 'GetPayment' as const,
    ...payload,
}));

export const ListPaymentsSchema = z.object({
    page: Id.default(1),
}).strict().transform((payload) => ({
    requestType: 'ListPayments' as const,
    ...payload,
}));

export const ListSectionsSchema = z.object({}).strict().transform(() => ({
    requestType: 'ListSections' as const,
}));

export const REQUEST_SCHEMAS = {
    CreateGrade: CreateGradeSchema,
    ListSectionGrades: ListSectionGradesSchema,
    ListStudentGrades: ListStudentGradesSchema,
    GetStudentReportCard: GetStudentReportCardSchema,
    GetUserProfile: GetUserProfileSchema,
    UpdateUserProfile: UpdateUserProfileSchema,
    GetPayment: GetPaymentSchema,
    ListPayments: ListPaymentsSchema,
    ListSections: ListSectionsSchema,
} as const;

export type SchoolRequestType = keyof typeof REQUEST_SCHEMAS;

export type CreateGradeCommand = z.output<typeof CreateGradeSchema>;

export type SchoolRequest = z.output<typeof REQUEST_SCHEMAS[SchoolRequestType]>;

export function isSchoolRequestType(value: string): value is SchoolRequestType {
    return Object.prototype.hasOwnProperty.call(REQUEST_SCHEMAS, value);
}
