/**
 * Capability Markers
 *
 * A closed set of request shapes a policy routine may read from. A request
 * carries one marker per capability it exposes; policies ask for exactly one
 * kind and never inspect the concrete request type.
 */

export interface TeacherScopedMarker {
    readonly kind: 'teacherScoped';
    readonly sectionId: number;
    readonly subjectId: number;
}

export interface StudentScopedMarker {
    readonly kind: 'studentScoped';
    readonly studentId: number;
}

export interface SelfScopedMarker {
    readonly kind: 'selfScoped';
    readonly targetUserId: string;
}

export type CapabilityMarker =
    | TeacherScopedMarker
    | StudentScopedMarker
    | SelfScopedMarker;

export type CapabilityKind = CapabilityMarker['kind'];

export type MarkerOf<K extends CapabilityKind> = Extract<CapabilityMarker, { kind: K }>;

/**
 * Anything that goes through the authorization pipeline.
 * `requestType` keys the static requirement table.
 */
export interface AuthorizableRequest {
    readonly requestType: string;
    readonly markers?: readonly CapabilityMarker[];
}

export function findMarker<K extends CapabilityKind>(
    request: AuthorizableRequest,
    kind: K
): MarkerOf<K> | undefined {
    return request.markers?.find((marker): marker is MarkerOf<K> => marker.kind === kind);
}

export function teacherScoped(sectionId: number, subjectId: number): TeacherScopedMarker {
    return { kind: 'teacherScoped', sectionId, subjectId };
}

export function studentScoped(studentId: number): StudentScopedMarker {
    return { kind: 'studentScoped', studentId };
}

export function selfScoped(targetUserId: string): SelfScopedMarker {
    return { kind: 'selfScoped', targetUserId };
}
