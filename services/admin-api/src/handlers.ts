import type { SchoolRequest } from "../../../libs/catalog/requests.js";
import type { HandlerContext, RequestDispatcher } from "../../../libs/dispatch/dispatcher.js";

/**
 * Handlers only run after authorization has passed. Grade, profile and
 * payment persistence live in their own services; these acknowledge the
 * authorized request within the caller's tenant.
 */
function acknowledge(requestType: SchoolRequest["requestType"], context: HandlerContext) {
    context.log.info({ requestType }, "Authorized request accepted");
    return { accepted: true, requestType, tenantId: context.tenant.id, requestId: context.requestId };
}

export function registerSchoolHandlers(dispatcher: RequestDispatcher<SchoolRequest>): RequestDispatcher<SchoolRequest> {
    return dispatcher
        .register("CreateGrade", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            studentId: request.studentId,
            score: request.score
        }))
        .register("ListSectionGrades", async (request, context) => acknowledge(request.requestType, context))
        .register("ListStudentGrades", async (request, context) => {
            const student = await context.tenant.lookups.existsStudent(request.studentId);
            return { ...acknowledge(request.requestType, context), studentId: request.studentId, student };
        })
        .register("GetStudentReportCard", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            studentId: request.studentId,
            term: request.term
        }))
        .register("GetUserProfile", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            userId: request.userId
        }))
        .register("UpdateUserProfile", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            userId: request.userId,
            displayName: request.displayName
        }))
        .register("GetPayment", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            paymentId: request.paymentId
        }))
        .register("ListPayments", async (request, context) => ({
            ...acknowledge(request.requestType, context),
            page: request.page
        }))
        .register("ListSections", async (request, context) => acknowledge(request.requestType, context));
}
