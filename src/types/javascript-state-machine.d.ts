// The package ships no typings. Only the surface StepMachine uses is declared.
declare module 'javascript-state-machine' {
  interface StepTransition {
    name: string;
    from: string;
    to: string;
  }

  interface StepMachineConfig {
    init: string;
    transitions: StepTransition[];
  }

  class StateMachine {
    constructor(config: StepMachineConfig);
    can(transition: string): boolean;
  }

  export = StateMachine;
}
