import { expect } from 'chai';
import { describe, it } from 'mocha';
import * as inspector from 'inspector';
import { isDebuggerAttached } from '@/index';

describe('Debug Utils', function () {
    it('should follow the state of the inspector', function () {
        const inspectorOpen = inspector.url() !== undefined;

        expect(isDebuggerAttached()).to.equal(inspectorOpen);
    });
});
