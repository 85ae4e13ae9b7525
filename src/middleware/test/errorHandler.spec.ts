// src/middleware/test/errorHandler.spec.ts
import { errorHandler } from "../errorHandler";
import { InvariantViolationError, NotFoundError } from "../../utils/errors";

const req = { method: "GET", originalUrl: "/api/v1/competitions/9/registration_list" };

function mockRes(headersSent = false) {
    return { headersSent, status: jest.fn().mockReturnThis(), json: jest.fn().mockReturnThis() };
}

describe("errorHandler", () => {
    let logged: jest.SpyInstance;
    beforeEach(() => {
        logged = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });
    afterEach(() => logged.mockRestore());

    test("NotFoundError → 404 with its message, not logged", () => {
        const res = mockRes();
        errorHandler(new NotFoundError("No competition for id 9 found"), req, res, jest.fn());

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.json).toHaveBeenCalledWith({ error: "No competition for id 9 found" });
        expect(logged).not.toHaveBeenCalled();
    });

    test("InvariantViolationError → 500 with its message, logged", () => {
        const res = mockRes();
        errorHandler(new InvariantViolationError("grouped 2 of 3"), req, res, jest.fn());

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({ error: "grouped 2 of 3" });
        expect(logged).toHaveBeenCalledTimes(1);
    });

    test("anything else → generic 500", () => {
        const res = mockRes();
        errorHandler(new Error("ECONNREFUSED 127.0.0.1:3306"), req, res, jest.fn());

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({ error: "Internal Server Error" });
        expect(logged).toHaveBeenCalledTimes(1);
    });

    test("headers already sent → delegate to express", () => {
        const res = mockRes(true);
        const next = jest.fn();
        const err = new Error("late");
        errorHandler(err, req, res, next);

        expect(next).toHaveBeenCalledWith(err);
        expect(res.status).not.toHaveBeenCalled();
    });
});
