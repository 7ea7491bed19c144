export default {
  name: "missing-process"
};
