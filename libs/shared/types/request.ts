import { Request } from 'express';

export interface AdminSessionPayload {
	sub: 'admin';
	iat?: number;
	exp?: number;
}

export interface IRequest extends Request {
	admin?: AdminSessionPayload;
}
