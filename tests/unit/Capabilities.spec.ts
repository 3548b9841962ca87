import { describe, it } from 'node:test';
import assert from 'node:assert';
import { findMarker, selfScoped, studentScoped, teacherScoped } from '../../libs/authz/capabilities.js';
import {
    CreateGradeSchema,
    GetUserProfileSchema,
    isSchoolRequestType,
    ListPaymentsSchema,
    ListSectionsSchema,
    ListStudentGradesSchema
} from '../../libs/catalog/requests.js';

describe('Capability markers', () => {
    const request = {
        requestType: 'Mixed',
        markers: [teacherScoped(10, 3), selfScoped('user-1')]
    };

    it('finds the marker of the requested kind', () => {
        assert.deepStrictEqual(findMarker(request, 'teacherScoped'), { kind: 'teacherScoped', sectionId: 10, subjectId: 3 });
        assert.deepStrictEqual(findMarker(request, 'selfScoped'), { kind: 'selfScoped', targetUserId: 'user-1' });
    });

    it('returns undefined for a kind the request does not carry', () => {
        assert.strictEqual(findMarker(request, 'studentScoped'), undefined);
        assert.strictEqual(findMarker({ requestType: 'Bare' }, 'studentScoped'), undefined);
    });

    it('builds tagged markers', () => {
        assert.deepStrictEqual(studentScoped(42), { kind: 'studentScoped', studentId: 42 });
    });
});

describe('Request catalog', () => {
    it('attaches the teacher marker to grade creation', () => {
        const command = CreateGradeSchema.parse({ sectionId: '5', subjectId: 2, studentId: 9, score: 87.5 });

        assert.deepStrictEqual(command, {
            requestType: 'CreateGrade',
            sectionId: 5,
            subjectId: 2,
            studentId: 9,
            score: 87.5,
            markers: [{ kind: 'teacherScoped', sectionId: 5, subjectId: 2 }]
        });
    });

    it('attaches the student marker to student grade listing', () => {
        const query = ListStudentGradesSchema.parse({ studentId: 100 });
        assert.deepStrictEqual(query.markers, [{ kind: 'studentScoped', studentId: 100 }]);
    });

    it('attaches the self marker to profile reads', () => {
        const query = GetUserProfileSchema.parse({ userId: 'user-7' });
        assert.deepStrictEqual(query.markers, [{ kind: 'selfScoped', targetUserId: 'user-7' }]);
    });

    it('rejects unexpected fields', () => {
        const result = CreateGradeSchema.safeParse({ sectionId: 5, subjectId: 2, studentId: 9, score: 50, tenantId: 'tenant-b' });
        assert.strictEqual(result.success, false);
    });

    it('rejects scores outside 0..100', () => {
        assert.strictEqual(CreateGradeSchema.safeParse({ sectionId: 5, subjectId: 2, studentId: 9, score: 101 }).success, false);
    });

    it('applies defaults and carries no marker where none is exposed', () => {
        assert.deepStrictEqual(ListPaymentsSchema.parse({}), { requestType: 'ListPayments', page: 1 });
        assert.deepStrictEqual(ListSectionsSchema.parse({}), { requestType: 'ListSections' });
    });

    it('recognizes only catalog request types', () => {
        assert.strictEqual(isSchoolRequestType('CreateGrade'), true);
        assert.strictEqual(isSchoolRequestType('DeleteSchool'), false);
        assert.strictEqual(isSchoolRequestType('toString'), false);
    });
});
